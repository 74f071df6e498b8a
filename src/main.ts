/**
 * relay-ci trigger server.
 *
 * Listens for push hooks and run requests, and executes the pipeline
 * definition for each accepted trigger.
 */

import { resolveDefinition, resolveRelease } from './cli';
import { loadConfig } from './config';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';
import { FileSystemArtifactStore } from './storage/fs-artifact-store';
import { createMemoryStore } from './storage/memory-store';
import { createDefaultToolchain } from './toolchain/adapters';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const definition = await resolveDefinition(config, Boolean(process.env.RELAY_PIPELINE_FILE));
  const context = createAppContext(
    {
      definition,
      toolchain: createDefaultToolchain({ repoUrl: config.repoUrl }),
      workDir: config.workDir,
      release: resolveRelease(config),
    },
    {
      store: createMemoryStore(new FileSystemArtifactStore(config.artifactDir)),
      webhookSecret: config.webhookSecret,
    },
  );

  const server = createApp(context).listen(config.port, () => {
    logger.info('relay-ci listening', { port: config.port, pipeline: definition.name });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    const pending = context.orchestrator
      .inFlightRunIds()
      .map((runId) => context.orchestrator.cancelRun(runId, 'system', `Server shutdown (${signal})`));
    void Promise.allSettled(pending).then(() => server.close());
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  logger.error('Failed to start', { error: err instanceof Error ? err.message : String(err) });
  process.exitCode = 1;
});
