/**
 * Weekly grid storage and report projection.
 */

export * from './bucketGrid/index.js';
export * from './report/index.js';
