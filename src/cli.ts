/**
 * `run-pipeline` command.
 *
 *   run-pipeline --ref <ref> --event {push,tag} [--config <file>]
 *                [--work-dir <dir>] [--artifact-dir <dir>] [--repo-url <url>]
 *                [--repository <owner/name>] [--log-level <level>]
 *
 * Exit codes: 0 success (including a skipped run), 1 build failure,
 * 2 release failure, 3 canceled, 64 usage or definition error.
 */

import path from 'path';
import { OrchestratorConfig, Environment, loadConfig } from './config';
import { DataPlanePublisher } from './data-plane/publisher';
import { PipelineDefinition } from './domain/pipeline';
import { PipelineRun } from './domain/run';
import { TriggerEventType, parseEventType } from './domain/trigger';
import { DefinitionError, createDefaultDefinition, loadPipelineDefinition } from './dsl';
import { ToolchainResolver } from './engine/build-stage';
import { OrchestratorOptions, PipelineOrchestrator } from './engine/orchestrator';
import { EXIT_CODES, exitCodeForState } from './engine/state-machine';
import { LogLevel, logger, parseLogLevel, setLogLevel } from './logger';
import { FileSystemArtifactStore } from './storage/fs-artifact-store';
import { createMemoryStore } from './storage/memory-store';
import { Store } from './storage/store';
import { ReleaseHost, Toolchain } from './toolchain';
import { GitHubReleaseHost, createDefaultToolchain } from './toolchain/adapters';

export const USAGE = `Usage: run-pipeline --ref <ref> --event {push,tag} [options]

Options:
  --ref <ref>              Branch or tag to build (e.g. main, v1.2.0, refs/tags/v1.2.0)
  --event <push|tag>       Kind of push that triggered the run
  --config <file>          Pipeline definition (default: pipeline.json)
  --work-dir <dir>         Root of per-entry workspaces (default: .relay/work)
  --artifact-dir <dir>     Artifact store directory (default: .relay/artifacts)
  --repo-url <url>         Repository to check out (default: current directory)
  --repository <owner/name> Repository to publish releases on
  --log-level <level>      debug, info, warn or error
  -h, --help               Show this help`;

/** Parsed `run-pipeline` arguments. */
export interface RunPipelineCommand {
  ref: string;
  event: TriggerEventType;
  config?: string;
  workDir?: string;
  artifactDir?: string;
  repoUrl?: string;
  repository?: string;
  logLevel?: LogLevel;
  help: boolean;
}

/** Invalid command line. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parse `run-pipeline` arguments. Flags take their value as the next
 * argument or after `=` (`--ref=v1.0.0`).
 */
export function parseCliArgs(argv: string[]): RunPipelineCommand {
  let ref = '';
  let event: TriggerEventType | undefined;
  let help = false;
  const command: Omit<RunPipelineCommand, 'ref' | 'event' | 'help'> = {};

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i];
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const arg = eq > 0 ? raw.slice(0, eq) : raw;
    const inline = eq > 0 ? raw.slice(eq + 1) : undefined;

    function consumeValue(flag: string): string {
      if (inline !== undefined) return inline;
      i++;
      if (i >= argv.length) {
        throw new UsageError(`${flag} requires a value`);
      }
      return argv[i];
    }

    switch (arg) {
      case '--ref':
        ref = consumeValue(arg).trim();
        break;
      case '--event': {
        const value = consumeValue(arg);
        const parsed = parseEventType(value);
        if (!parsed) {
          throw new UsageError(`--event must be "push" or "tag", got "${value}"`);
        }
        event = parsed;
        break;
      }
      case '--config':
        command.config = consumeValue(arg);
        break;
      case '--work-dir':
        command.workDir = consumeValue(arg);
        break;
      case '--artifact-dir':
        command.artifactDir = consumeValue(arg);
        break;
      case '--repo-url':
        command.repoUrl = consumeValue(arg);
        break;
      case '--repository':
        command.repository = consumeValue(arg);
        break;
      case '--log-level': {
        const value = consumeValue(arg);
        const level = parseLogLevel(value);
        if (level === undefined) {
          throw new UsageError(`--log-level must be debug, info, warn or error, got "${value}"`);
        }
        command.logLevel = level;
        break;
      }
      case '-h':
      case '--help':
        help = true;
        break;
      default:
        throw new UsageError(`unknown argument: ${raw}`);
    }
  }

  if (help) {
    return { ref, event: event ?? 'push-to-branch', help, ...command };
  }
  if (!ref) {
    throw new UsageError('--ref is required');
  }
  if (!event) {
    throw new UsageError('--event is required');
  }
  return { ref, event, help, ...command };
}

/** Collaborators and streams for a CLI invocation; tests replace them. */
export interface CliDependencies {
  env?: Environment;
  cwd?: string;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  toolchain?: Toolchain | ToolchainResolver;
  releaseHost?: ReleaseHost;
  store?: Store;
  /** Aborting it cancels the run (SIGINT in the bin script). */
  signal?: AbortSignal;
}

/** Apply command-line overrides on top of the environment configuration. */
export function resolveConfig(command: RunPipelineCommand, env: Environment, cwd: string): OrchestratorConfig {
  const config = loadConfig(env, cwd);
  return {
    ...config,
    definitionPath: command.config ? path.resolve(cwd, command.config) : config.definitionPath,
    workDir: command.workDir ? path.resolve(cwd, command.workDir) : config.workDir,
    artifactDir: command.artifactDir ? path.resolve(cwd, command.artifactDir) : config.artifactDir,
    repoUrl: command.repoUrl ?? config.repoUrl,
    repository: command.repository ?? config.repository,
    logLevel: command.logLevel ?? config.logLevel,
  };
}

/**
 * Load the definition. A missing file at the default location falls back
 * to the built-in definition; an explicitly named file must exist.
 */
export async function resolveDefinition(config: OrchestratorConfig, explicit: boolean): Promise<PipelineDefinition> {
  try {
    return await loadPipelineDefinition(config.definitionPath);
  } catch (err) {
    const notFound = err instanceof DefinitionError && err.errors.every((e) => e.code === 'VALIDATION.NOT_FOUND');
    if (notFound && !explicit) {
      logger.info('No pipeline definition found; using built-in defaults', { path: config.definitionPath });
      return createDefaultDefinition();
    }
    throw err;
  }
}

export function resolveRelease(
  config: OrchestratorConfig,
  deps: Pick<CliDependencies, 'releaseHost'> = {},
): OrchestratorOptions['release'] {
  if (!config.releaseToken) return undefined;
  if (deps.releaseHost) {
    return { host: deps.releaseHost, credentials: { token: config.releaseToken } };
  }
  if (!config.repository) {
    logger.warn('Release token set but no repository configured; releases are disabled');
    return undefined;
  }
  return {
    host: new GitHubReleaseHost({
      repository: config.repository,
      apiUrl: config.releaseApiUrl,
      uploadUrl: config.releaseUploadUrl,
    }),
    credentials: { token: config.releaseToken },
  };
}

/** Human-readable run report, one line per entry. */
export function formatRunSummary(run: PipelineRun): string[] {
  const lines = [`Run ${run.id} (${run.trigger.ref}): ${run.state}`];
  for (const entry of Object.values(run.entries)) {
    const detail = entry.error ? ` ${entry.error.code}: ${entry.error.message}` : '';
    lines.push(`  ${entry.platformId.padEnd(10)} ${entry.status.padEnd(10)} ${entry.artifactName}${detail}`);
  }
  if (run.release) {
    lines.push(`Release ${run.release.tag}: ${run.release.files.map((f) => f.name).join(', ')}`);
    if (run.release.url) lines.push(`  ${run.release.url}`);
  }
  if (run.error && !run.error.code.startsWith('BUILD.')) {
    lines.push(`Error ${run.error.code}: ${run.error.message}`);
  }
  return lines;
}

/** Run the command and return the process exit code. */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));
  const env = deps.env ?? process.env;
  const cwd = deps.cwd ?? process.cwd();

  let command: RunPipelineCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      stderr(`run-pipeline: ${err.message}`);
      stderr(USAGE);
      return EXIT_CODES.usage;
    }
    throw err;
  }
  if (command.help) {
    stdout(USAGE);
    return EXIT_CODES.success;
  }

  const config = resolveConfig(command, env, cwd);
  setLogLevel(config.logLevel);

  let definition: PipelineDefinition;
  try {
    definition = await resolveDefinition(config, Boolean(command.config ?? env.RELAY_PIPELINE_FILE));
  } catch (err) {
    if (err instanceof DefinitionError) {
      stderr(`run-pipeline: ${err.message}`);
      return EXIT_CODES.usage;
    }
    throw err;
  }

  const store = deps.store ?? createMemoryStore(new FileSystemArtifactStore(config.artifactDir));
  const orchestrator = new PipelineOrchestrator(store, new DataPlanePublisher(store), {
    definition,
    toolchain: deps.toolchain ?? createDefaultToolchain({ repoUrl: config.repoUrl }),
    workDir: config.workDir,
    release: resolveRelease(config, deps),
  });

  const run = await orchestrator.runPipeline({ eventType: command.event, ref: command.ref }, { signal: deps.signal });
  for (const line of formatRunSummary(run)) {
    stdout(line);
  }
  return run.exitCode ?? exitCodeForState(run.state);
}
