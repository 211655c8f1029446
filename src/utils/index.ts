/**
 * Utility exports
 */

export * from './dates';
export * from './errors';
export * from './http';
export * from './logger';
export * from './retry';
