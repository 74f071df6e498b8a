export * from './loader';
export * from './schema';
export * from './validator';
export * from './version';
