import {
  getCell,
  incrementOnline,
  registerActivityDate,
  type BucketGrid,
} from '../../analytics/bucketGrid/index.js';
import {
  mapLocalToBucketKey,
  toLocalTimeParts,
  truncateToBucketStart,
} from '../../clocks/local.js';
import { MS_PER_MINUTE } from '../../time/constants.js';
import type { TimeSpan } from '../../time/timeSpan.js';

function bucketMs(grid: BucketGrid): number {
  return grid.layout.bucketMinutes * MS_PER_MINUTE;
}

/**
 * Marks the bucket beginning at bucketStartMs as observed on its local date.
 */
export function registerBucketDate(bucketStartMs: number, grid: BucketGrid): void {
  const { localDate } = toLocalTimeParts(bucketStartMs, grid.layout.timezone);
  const cell = getCell(grid, mapLocalToBucketKey(bucketStartMs, grid.layout));
  registerActivityDate(cell, localDate);
}

/**
 * Adds one presence increment to every bucket a clamped span touches.
 *
 * The span start is truncated to its bucket boundary, so a sliver at the
 * start still counts in full. Each touched bucket also records its local date,
 * since presence was only counted while the observer was running.
 *
 * @example
 * // 15-minute buckets: [00:07, 00:22) increments the 00:00 and 00:15 buckets once each
 */
export function updateBucketCountsForRange(span: TimeSpan, grid: BucketGrid): void {
  const step = bucketMs(grid);
  let currentMs = truncateToBucketStart(span.startMs, grid.layout);

  while (currentMs < span.stopMs) {
    const { localDate } = toLocalTimeParts(currentMs, grid.layout.timezone);
    const cell = getCell(grid, mapLocalToBucketKey(currentMs, grid.layout));
    incrementOnline(cell);
    registerActivityDate(cell, localDate);
    currentMs += step;
  }
}

/**
 * Records the local dates on which the observer was active for every bucket
 * a span covers, without touching presence counts.
 *
 * Whole buckets are always registered. A partial bucket at either end is
 * registered only when the span covers more than half of it.
 */
export function registerBucketDatesForRange(span: TimeSpan, grid: BucketGrid): void {
  const step = bucketMs(grid);
  const halfStep = step / 2;
  const firstBucketStartMs = truncateToBucketStart(span.startMs, grid.layout);

  let currentMs = firstBucketStartMs;
  if (firstBucketStartMs !== span.startMs) {
    const secondBucketStartMs = firstBucketStartMs + step;
    const leadingCoveredMs = Math.min(secondBucketStartMs, span.stopMs) - span.startMs;
    if (leadingCoveredMs > halfStep) {
      registerBucketDate(firstBucketStartMs, grid);
    }
    currentMs = secondBucketStartMs;
  }

  while (currentMs + step <= span.stopMs) {
    registerBucketDate(currentMs, grid);
    currentMs += step;
  }

  const trailingCoveredMs = span.stopMs - currentMs;
  if (trailingCoveredMs > halfStep) {
    registerBucketDate(currentMs, grid);
  }
}
