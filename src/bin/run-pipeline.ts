#!/usr/bin/env node
import { runCli } from '../cli';
import { logger } from '../logger';

const controller = new AbortController();
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.warn('Received signal; canceling run', { signal });
    controller.abort();
  });
}

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error('run-pipeline crashed', {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exitCode = 70;
  });
