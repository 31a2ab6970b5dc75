/**
 * Layer builder barrel file.
 */
export * from './types.js';
export * from './staging.js';
export * from './installer.js';
export * from './prune.js';
export * from './archive.js';
export * from './builder.js';
