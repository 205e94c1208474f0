import {
  createBucketGrid,
  type BucketGrid,
} from '../analytics/bucketGrid/index.js';
import { IntegrityError } from '../domain/errors.js';
import type { PresenceRow, UptimeEvent } from '../domain/types.js';
import type { AnalysisOptions } from '../domain/validation.js';
import { clampToUptime } from '../measurement/clampToUptime/clampToUptime.js';
import { reconstructUptime } from '../measurement/reconstructUptime/reconstructUptime.js';
import { updateBucketCountsForRange } from '../measurement/registerBuckets/registerBuckets.js';
import { createBucketLayout } from '../time/bucket.js';
import { MS_PER_MINUTE } from '../time/constants.js';
import { isNegativeOrZero } from '../time/timeSpan.js';
import { collectPresenceIntervals } from './presenceIntervals.js';

/**
 * Inputs of one analysis run, as supplied by the event source.
 */
export interface AnalyzePresenceParams {
  /** Observer activity timestamps, ascending */
  activityTimestampsMs: readonly number[];
  /** Presence rows in recorded order */
  presenceRows: Iterable<PresenceRow>;
  options: AnalysisOptions;
}

export interface AnalysisStats {
  activityTimestamps: number;
  uptimeWindows: number;
  presenceIntervals: number;
  clampedSpans: number;
  droppedIntervals: number;
}

export interface AnalysisResult {
  grid: BucketGrid;
  timeline: UptimeEvent[];
  stats: AnalysisStats;
}

/**
 * Runs the full pipeline: reconstruct observer uptime, clamp every presence
 * interval to it, and accumulate the clamped spans into a weekly grid.
 *
 * @throws IntegrityError on unsorted input or an inconsistent clamp
 */
export function analyzePresence(params: AnalyzePresenceParams): AnalysisResult {
  const { activityTimestampsMs, presenceRows, options } = params;

  const grid = createBucketGrid(
    createBucketLayout(options.bucketMinutes, options.timezone),
  );

  const timeline = reconstructUptime(activityTimestampsMs, {
    thresholdMs: options.runningThresholdMinutes * MS_PER_MINUTE,
    grid,
  });

  const stats: AnalysisStats = {
    activityTimestamps: activityTimestampsMs.length,
    uptimeWindows: timeline.length / 2,
    presenceIntervals: 0,
    clampedSpans: 0,
    droppedIntervals: 0,
  };

  const intervals = collectPresenceIntervals(presenceRows, {
    allowedUserIds:
      options.allowedUserIds === undefined ? undefined : new Set(options.allowedUserIds),
    startTimeMs: options.startTimeMs,
  });

  for (const interval of intervals) {
    stats.presenceIntervals++;

    const result = clampToUptime(interval.span, timeline);
    if (!result.ok) {
      stats.droppedIntervals++;
      continue;
    }

    for (const span of result.spans) {
      if (isNegativeOrZero(span)) {
        throw new IntegrityError(
          'nonPositiveClampedSpan',
          `got a non-positive clamped duration for ${interval.displayName}`,
        );
      }
      updateBucketCountsForRange(span, grid);
      stats.clampedSpans++;
    }
  }

  return { grid, timeline, stats };
}
