/**
 * Core domain types for presence analysis.
 * These types describe the two input streams and the observer timeline derived from them.
 */

import type { TimeSpan } from '../time/timeSpan.js';

/**
 * Branded type for user identifiers.
 * Provides type safety to distinguish user IDs from display names and other strings.
 */
export type UserId = string & { readonly __brand: 'UserId' };

/**
 * Creates a UserId from a string, throwing if empty.
 */
export function createUserId(value: string): UserId {
  if (value.length === 0) {
    throw new Error('UserId must be a non-empty string');
  }
  return value as UserId;
}

/**
 * Kind of an observer uptime event (discriminated union discriminator).
 */
export type UptimeEventKind = 'start' | 'stop';

/**
 * One edge of the observer's inferred up/down timeline.
 * A timeline alternates start, stop, start, stop, ... and always ends on stop.
 */
export interface UptimeEvent {
  readonly tsMs: number;
  readonly kind: UptimeEventKind;
}

export function startEvent(tsMs: number): UptimeEvent {
  return { tsMs, kind: 'start' };
}

export function stopEvent(tsMs: number): UptimeEvent {
  return { tsMs, kind: 'stop' };
}

/**
 * Kind of a presence row.
 */
export type PresenceKind = 'online' | 'offline';

/**
 * A single online/offline event for one user, as supplied by the event source.
 */
export interface PresenceRow {
  readonly tsMs: number;
  readonly userId: UserId;
  readonly displayName: string;
  readonly kind: PresenceKind;
}

/**
 * One user's online-to-offline span, before it is clamped to observer uptime.
 */
export interface PresenceInterval {
  readonly userId: UserId;
  readonly displayName: string;
  readonly span: TimeSpan;
}
