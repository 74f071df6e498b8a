/**
 * Process configuration.
 *
 * Read once from the environment at the process edge (CLI, server) and
 * passed down explicitly. Nothing below this module reads process.env;
 * in particular the release token reaches the release stage only through
 * its constructor.
 */

import path from 'path';
import { LogLevel, parseLogLevel } from './logger';

export interface OrchestratorConfig {
  /** Pipeline definition document. */
  definitionPath: string;
  /** Root under which each run gets `<runId>/<platformId>` workspaces. */
  workDir: string;
  /** Root of the filesystem artifact store. */
  artifactDir: string;
  /** Repository the source control host clones from (URL or local path). */
  repoUrl: string;
  /** `owner/name` of the repository on the release host. */
  repository?: string;
  releaseApiUrl: string;
  releaseUploadUrl: string;
  releaseToken?: string;
  /** Shared secret for `X-Hub-Signature-256` on push hooks; unset accepts unsigned hooks. */
  webhookSecret?: string;
  logLevel: LogLevel;
  port: number;
}

export type Environment = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/** Build the configuration from environment variables. */
export function loadConfig(env: Environment = process.env, cwd: string = process.cwd()): OrchestratorConfig {
  const port = parseInt(env.PORT ?? '5000', 10);
  return {
    definitionPath: path.resolve(cwd, nonEmpty(env.RELAY_PIPELINE_FILE) ?? 'pipeline.json'),
    workDir: path.resolve(cwd, nonEmpty(env.RELAY_WORK_DIR) ?? '.relay/work'),
    artifactDir: path.resolve(cwd, nonEmpty(env.RELAY_ARTIFACT_DIR) ?? '.relay/artifacts'),
    repoUrl: nonEmpty(env.RELAY_REPO_URL) ?? cwd,
    repository: nonEmpty(env.RELAY_REPOSITORY) ?? nonEmpty(env.GITHUB_REPOSITORY),
    releaseApiUrl: nonEmpty(env.GITHUB_API_URL) ?? 'https://api.github.com',
    releaseUploadUrl: nonEmpty(env.RELAY_UPLOAD_URL) ?? 'https://uploads.github.com',
    releaseToken: nonEmpty(env.RELAY_RELEASE_TOKEN) ?? nonEmpty(env.GITHUB_TOKEN),
    webhookSecret: nonEmpty(env.RELAY_WEBHOOK_SECRET),
    logLevel: parseLogLevel(env.LOG_LEVEL) ?? LogLevel.Info,
    port: Number.isNaN(port) ? 5000 : port,
  };
}
