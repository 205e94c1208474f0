/**
 * Local-time clock mapping: reading instants as wall-clock time in the configured timezone.
 */

export * from './local.js';
