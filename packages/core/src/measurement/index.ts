/**
 * Observer uptime inference, interval clamping and bucket registration.
 */

export * from './reconstructUptime/reconstructUptime.js';
export * from './clampToUptime/clampToUptime.js';
export * from './registerBuckets/registerBuckets.js';
