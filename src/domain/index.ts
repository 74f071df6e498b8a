/**
 * Domain model exports.
 */

export * from './artifact';
export * from './errors';
export * from './events';
export * from './pipeline';
export * from './release';
export * from './run';
export * from './trigger';
