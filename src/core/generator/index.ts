/**
 * Orchestrator barrel file.
 */
export * from './types.js';
export * from './progress.js';
export * from './generator.js';
