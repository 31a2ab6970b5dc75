/**
 * Spec parser barrel file.
 */
export * from './types.js';
export * from './parser.js';
export * from './layer-name.js';
