/**
 * layersmith - build AWS Lambda layers from Python package specifiers.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Runtimes
export * from './core/runtimes.js';

// Spec parsing and layer naming
export * from './core/spec-parser/index.js';

// Layer building
export * from './core/builder/index.js';

// Publishing
export * from './core/publisher/index.js';

// Orchestration
export * from './core/generator/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
