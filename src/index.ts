/**
 * relay-ci: cross-platform build-and-release pipeline orchestrator.
 *
 * Public exports for programmatic use. The trigger server lives in
 * ./main and the command line in ./bin/run-pipeline.
 */

export { createApp, createAppContext } from './server';
export type { AppContext } from './server';
export { runCli, parseCliArgs, formatRunSummary } from './cli';
export { loadConfig } from './config';
export type { OrchestratorConfig } from './config';
export * from './logger';
export * from './domain';
export * from './dsl';
export * from './engine';
export * from './storage';
export * from './data-plane';
export * from './toolchain';
export * from './toolchain/adapters';
