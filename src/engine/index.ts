export * from './build-stage';
export * from './orchestrator';
export * from './release-stage';
export * from './state-machine';
export * from './step-runner';
