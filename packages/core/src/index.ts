/**
 * Core engine for the weekly presence histogram.
 * This package contains pure TypeScript logic with no I/O.
 */

/**
 * Re-export all domain types, errors and validation schemas.
 */
export * from './domain/index.js';

/**
 * Re-export all time-of-week bucket utilities.
 */
export * from './time/index.js';

/**
 * Re-export local-time clock mapping.
 */
export * from './clocks/index.js';

/**
 * Re-export uptime reconstruction, clamping and bucket registration.
 */
export * from './measurement/index.js';

/**
 * Re-export grid storage and report projection.
 */
export * from './analytics/index.js';

/**
 * Re-export the end-to-end pipeline.
 */
export * from './pipeline/index.js';
