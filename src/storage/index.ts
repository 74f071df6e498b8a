export * from './fs-artifact-store';
export * from './memory-store';
export * from './store';
