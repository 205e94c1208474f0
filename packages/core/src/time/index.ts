/**
 * Time-of-week bucket utilities.
 *
 * This module provides clock-agnostic pieces of the weekly histogram:
 * - Calendar constants
 * - Bucket layout validation and index/label conversion
 * - The TimeSpan value type
 */

export * from './constants.js';
export * from './bucket.js';
export * from './timeSpan.js';
