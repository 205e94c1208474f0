import type { BucketGrid } from '../../analytics/bucketGrid/index.js';
import { IntegrityError } from '../../domain/errors.js';
import {
  startEvent,
  stopEvent,
  type UptimeEvent,
} from '../../domain/types.js';
import { createTimeSpan } from '../../time/timeSpan.js';
import { registerBucketDatesForRange } from '../registerBuckets/registerBuckets.js';

/**
 * Parameters for inferring when the observer was running.
 */
export interface ReconstructUptimeParams {
  /** Largest gap between consecutive activity timestamps still treated as continuous uptime */
  thresholdMs: number;
  /** Grid whose activity dates are fed from every span of observed uptime */
  grid: BucketGrid;
}

/**
 * Appends a stop event, unless it would close a window at the instant it opened.
 * Such a window is removed instead so the timeline stays strictly increasing.
 */
function closeWindow(timeline: UptimeEvent[], tsMs: number): void {
  const last = timeline[timeline.length - 1];
  if (last !== undefined && last.kind === 'start' && last.tsMs === tsMs) {
    timeline.pop();
    return;
  }
  timeline.push(stopEvent(tsMs));
}

function formatInstant(tsMs: number): string {
  return Number.isFinite(tsMs) ? new Date(tsMs).toISOString() : String(tsMs);
}

/**
 * Reconstructs the observer's up/down timeline from its activity timestamps.
 *
 * Consecutive timestamps no further apart than the threshold mean the observer
 * ran continuously between them; a longer gap means it went idle at the
 * earlier timestamp. Every in-threshold pair is also registered as observed
 * time in the grid's activity dates.
 *
 * @param timestampsMs - Activity timestamps in ascending order
 * @returns Events alternating start/stop, ending on stop; empty if the observer was never seen running
 * @throws IntegrityError if the timestamps are not in ascending order or one is NaN
 *
 * @example
 * // threshold 10 minutes
 * reconstructUptime([00:00, 00:05, 02:00], params) // [start@00:00, stop@00:05]
 */
export function reconstructUptime(
  timestampsMs: readonly number[],
  params: ReconstructUptimeParams,
): UptimeEvent[] {
  const { thresholdMs, grid } = params;
  const timeline: UptimeEvent[] = [];
  let running = false;

  for (let i = 1; i < timestampsMs.length; i++) {
    const t1 = timestampsMs[i - 1];
    const t2 = timestampsMs[i];
    const gapMs = t2 - t1;
    // NaN fails this too
    if (!(gapMs >= 0)) {
      throw new IntegrityError(
        'unsortedTimestamps',
        `activity timestamps are not ascending: ${formatInstant(t2)} follows ${formatInstant(t1)}`,
      );
    }

    if (gapMs <= thresholdMs) {
      if (!running) {
        running = true;
        timeline.push(startEvent(t1));
      }
      registerBucketDatesForRange(createTimeSpan(t1, t2), grid);
    } else if (running) {
      running = false;
      closeWindow(timeline, t1);
    }
  }

  if (running) {
    closeWindow(timeline, timestampsMs[timestampsMs.length - 1]);
  }

  return timeline;
}
