/**
 * A span of time between two UTC instants, in milliseconds since epoch.
 *
 * Spans are not validated on construction; callers check
 * {@link isNegativeOrZero} where an empty or reversed span is a fault.
 */
export interface TimeSpan {
  readonly startMs: number;
  readonly stopMs: number;
}

export function createTimeSpan(startMs: number, stopMs: number): TimeSpan {
  return { startMs, stopMs };
}

/**
 * True when the span ends at or before it starts.
 */
export function isNegativeOrZero(span: TimeSpan): boolean {
  return span.stopMs <= span.startMs;
}

export function durationMs(span: TimeSpan): number {
  return span.stopMs - span.startMs;
}
