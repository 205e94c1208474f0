import { IntegrityError } from '../../domain/errors.js';
import type { UptimeEvent } from '../../domain/types.js';
import { createTimeSpan, type TimeSpan } from '../../time/timeSpan.js';

/**
 * Outcome of clamping a presence span to observer uptime.
 *
 * A span that cannot be attributed to any uptime window is not an error:
 * noisy logs produce them routinely, and they are simply dropped.
 */
export type ClampResult =
  | { ok: true; spans: TimeSpan[] }
  | { ok: false; reason: 'notRecoverable' };

const NOT_RECOVERABLE: ClampResult = { ok: false, reason: 'notRecoverable' };

/**
 * Returns the first index whose timestamp is not less than tsMs,
 * or timeline.length when every event is earlier.
 */
export function lowerBound(timeline: readonly UptimeEvent[], tsMs: number): number {
  let low = 0;
  let high = timeline.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (timeline[mid].tsMs < tsMs) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * Index of the event at or immediately before tsMs, or -1 if there is none.
 */
function eventAtOrBefore(timeline: readonly UptimeEvent[], tsMs: number): number {
  const index = lowerBound(timeline, tsMs);
  if (index < timeline.length && timeline[index].tsMs === tsMs) {
    return index;
  }
  return index - 1;
}

function expectKind(
  timeline: readonly UptimeEvent[],
  index: number,
  kind: UptimeEvent['kind'],
): UptimeEvent {
  const event = timeline[index];
  if (event === undefined || event.kind !== kind) {
    throw new IntegrityError(
      'brokenTimeline',
      `uptime timeline does not alternate: expected ${kind} at index ${index}`,
    );
  }
  return event;
}

/**
 * Clamps a span to the times the observer was known to be running.
 *
 * - Observer up for the whole span: the span is returned unchanged.
 * - Observer went down during the span: only the head, up to the stop, is kept.
 * - Observer came up during the span: only the tail, from the start, is kept.
 * - Observer went down and came back: head and tail are returned separately.
 * - Observer was down at the span start with no clean stop after it: not recoverable.
 *
 * @param span - Presence span with stop > start
 * @param timeline - Uptime events alternating start/stop, ending on stop
 */
export function clampToUptime(
  span: TimeSpan,
  timeline: readonly UptimeEvent[],
): ClampResult {
  const startIdx = eventAtOrBefore(timeline, span.startMs);
  if (startIdx < 0) {
    // no uptime recorded before the span began
    return NOT_RECOVERABLE;
  }

  // may equal timeline.length when nothing was recorded after the span ended
  const stopIdx = lowerBound(timeline, span.stopMs);
  const endsOnStop = stopIdx < timeline.length && timeline[stopIdx].kind === 'stop';

  const atStart = timeline[startIdx];
  switch (atStart.kind) {
    case 'stop': {
      // [..., stop, span start, ..., start, span stop, stop, ...]
      if (!endsOnStop) {
        return NOT_RECOVERABLE;
      }
      const tailStart = expectKind(timeline, stopIdx - 1, 'start');
      return { ok: true, spans: [createTimeSpan(tailStart.tsMs, span.stopMs)] };
    }

    case 'start': {
      // [..., start, span start, stop, ..., span stop, start, ...]
      if (!endsOnStop) {
        const headStop = expectKind(timeline, startIdx + 1, 'stop');
        return { ok: true, spans: [createTimeSpan(span.startMs, headStop.tsMs)] };
      }

      // [..., start, span start, stop, ..., start, span stop, stop, ...]
      if (startIdx !== stopIdx - 1) {
        const headStop = expectKind(timeline, startIdx + 1, 'stop');
        const tailStart = expectKind(timeline, stopIdx - 1, 'start');
        return {
          ok: true,
          spans: [
            createTimeSpan(span.startMs, headStop.tsMs),
            createTimeSpan(tailStart.tsMs, span.stopMs),
          ],
        };
      }

      // [..., start, span start, span stop, stop, ...]
      return { ok: true, spans: [span] };
    }

    default: {
      const _exhaustive: never = atStart.kind;
      throw new Error(`Unknown uptime event kind: ${String(_exhaustive)}`);
    }
  }
}
