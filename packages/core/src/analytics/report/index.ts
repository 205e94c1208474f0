/**
 * Projection of grid cells into report values.
 *
 * Raw counts are biased toward the times the observer happened to be running:
 * a bucket observed on 90 dates collects far more presence than one observed on
 * 5, even for a user who is online uniformly. Dividing the count by the number
 * of observed dates (the sample size) removes that bias.
 */

import { sampleSize, type BucketCell, type BucketGrid } from '../bucketGrid/index.js';
import { IntegrityError } from '../../domain/errors.js';
import { bucketIndexToLabel } from '../../time/bucket.js';
import { DAYS_PER_WEEK } from '../../time/constants.js';

/**
 * Report value for one cell (discriminated union).
 */
export type ProjectedValue =
  | { kind: 'empty' }
  | { kind: 'zero' }
  | { kind: 'count'; value: number }
  | { kind: 'ratio'; value: number };

export interface ProjectionOptions {
  /** Cells observed on fewer dates than this report no data */
  minimumBucketActivations: number;
  /** Report count / sample size instead of the raw count */
  normalize: boolean;
  /** Report no data as 0 instead of an empty value */
  noDataReturnsZero: boolean;
}

/**
 * One output line: a time of day and its value for each day, Monday first.
 */
export interface ReportRow {
  bucketIndex: number;
  /** Bucket start as HH:MM */
  label: string;
  values: ProjectedValue[];
}

/**
 * Projects a single cell.
 *
 * @throws IntegrityError if the cell has presence counts but no observed dates
 */
export function projectCell(
  cell: BucketCell,
  options: ProjectionOptions,
): ProjectedValue {
  const n = sampleSize(cell);
  const c = cell.onlineCount;

  if (n === 0 && c > 0) {
    throw new IntegrityError(
      'countWithoutSample',
      `bucket has ${c} presence counts but no activity dates`,
    );
  }

  if (n < options.minimumBucketActivations) {
    return options.noDataReturnsZero ? { kind: 'zero' } : { kind: 'empty' };
  }

  if (options.normalize) {
    // n is only 0 here when the minimum is 0, and then c is 0 as well
    return { kind: 'ratio', value: c / Math.max(n, 1) };
  }

  return { kind: 'count', value: c };
}

/**
 * Projects every cell of the grid, one row per bucket of the day.
 */
export function projectGrid(
  grid: BucketGrid,
  options: ProjectionOptions,
): ReportRow[] {
  const { layout } = grid;
  const rows: ReportRow[] = [];

  for (let bucketIndex = 0; bucketIndex < layout.bucketsPerDay; bucketIndex++) {
    const values: ProjectedValue[] = [];
    for (let day = 0; day < DAYS_PER_WEEK; day++) {
      const cell = grid.cells[day * layout.bucketsPerDay + bucketIndex];
      values.push(projectCell(cell, options));
    }
    rows.push({
      bucketIndex,
      label: bucketIndexToLabel(layout, bucketIndex),
      values,
    });
  }

  return rows;
}
