/**
 * Publisher barrel file.
 */
export * from './types.js';
export * from './credentials.js';
export * from './retry.js';
export * from './lambda-publisher.js';
