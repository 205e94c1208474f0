/**
 * Weekly histogram storage.
 *
 * Array layout: one flat array of DAYS_PER_WEEK × B cells, where B is the
 * number of buckets per day. Cell (day, bucket) lives at day × B + bucket.
 */

import { DAYS_PER_WEEK } from '../../time/constants.js';
import type { BucketKey, BucketLayout } from '../../time/bucket.js';

/**
 * Accumulator for one (weekday, time-of-day) slot.
 */
export interface BucketCell {
  /** Number of presence increments attributed to this bucket */
  onlineCount: number;
  /** Distinct local dates (YYYY-MM-DD) on which the observer was active during this bucket */
  readonly activityDates: Set<string>;
}

export interface BucketGrid {
  readonly layout: BucketLayout;
  readonly cells: readonly BucketCell[];
}

/**
 * Calculate the flat index of a cell.
 *
 * @returns Array index: (dayOfWeek × bucketsPerDay) + bucketIndex
 * @throws Error if bucketIndex is outside the layout
 */
export function cellIndex(layout: BucketLayout, key: BucketKey): number {
  if (
    !Number.isInteger(key.bucketIndex) ||
    key.bucketIndex < 0 ||
    key.bucketIndex >= layout.bucketsPerDay
  ) {
    throw new Error(
      `bucketIndex must be an integer in range [0, ${layout.bucketsPerDay - 1}], got ${key.bucketIndex}`,
    );
  }
  return key.dayOfWeek * layout.bucketsPerDay + key.bucketIndex;
}

/**
 * Create a new grid with every cell zeroed.
 */
export function createBucketGrid(layout: BucketLayout): BucketGrid {
  const size = DAYS_PER_WEEK * layout.bucketsPerDay;
  const cells: BucketCell[] = [];
  for (let i = 0; i < size; i++) {
    cells.push({ onlineCount: 0, activityDates: new Set() });
  }
  return { layout, cells };
}

export function getCell(grid: BucketGrid, key: BucketKey): BucketCell {
  const cell = grid.cells[cellIndex(grid.layout, key)];
  if (cell === undefined) {
    throw new Error(
      `No cell for day ${key.dayOfWeek}, bucket ${key.bucketIndex}`,
    );
  }
  return cell;
}

/**
 * Record that a user was online during this bucket.
 */
export function incrementOnline(cell: BucketCell): void {
  cell.onlineCount += 1;
}

/**
 * Record that the observer was running during this bucket on the given local date.
 * Registering the same date twice has no effect.
 */
export function registerActivityDate(cell: BucketCell, localDate: string): void {
  cell.activityDates.add(localDate);
}

/**
 * Number of distinct dates the observer was active for this bucket.
 */
export function sampleSize(cell: BucketCell): number {
  return cell.activityDates.size;
}
