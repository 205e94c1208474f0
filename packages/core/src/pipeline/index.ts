/**
 * End-to-end analysis: presence pairing and the single pass over both event streams.
 */

export * from './presenceIntervals.js';
export * from './analyzePresence.js';
