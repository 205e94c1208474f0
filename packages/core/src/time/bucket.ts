import {
  DAYS_PER_WEEK,
  MINUTES_PER_DAY,
  MINUTES_PER_HOUR,
} from './constants.js';

/**
 * Day of week representation: Monday = 0, Sunday = 6.
 */
export type DayOfWeek = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/**
 * Address of one cell of the weekly histogram.
 */
export interface BucketKey {
  /** Day of week: 0 = Monday, 6 = Sunday */
  dayOfWeek: DayOfWeek;
  /** Bucket within the day, in range [0, bucketsPerDay - 1] */
  bucketIndex: number;
}

/**
 * Shape of the weekly histogram: bucket width and the local timezone buckets are read in.
 */
export interface BucketLayout {
  /** Width of one bucket in minutes. Always divides 1440. */
  readonly bucketMinutes: number;
  /** Number of buckets per day (1440 / bucketMinutes) */
  readonly bucketsPerDay: number;
  /** IANA timezone string (e.g., "America/New_York") */
  readonly timezone: string;
}

/**
 * Narrows an integer in [0, 6] to a DayOfWeek.
 */
export function isDayOfWeek(value: number): value is DayOfWeek {
  return Number.isInteger(value) && value >= 0 && value < DAYS_PER_WEEK;
}

/**
 * Checks that a timezone name is understood by the runtime's Intl implementation.
 */
export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Returns the timezone of the host, used when none is configured.
 */
export function systemTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Builds a bucket layout, validating that the bucket width divides a day.
 *
 * @throws Error if bucketMinutes is not a positive integer dividing 1440,
 *         or if the timezone is unknown
 *
 * @example
 * createBucketLayout(15, 'UTC') // { bucketMinutes: 15, bucketsPerDay: 96, timezone: 'UTC' }
 */
export function createBucketLayout(
  bucketMinutes: number,
  timezone: string,
): BucketLayout {
  if (!Number.isInteger(bucketMinutes) || bucketMinutes <= 0) {
    throw new Error(
      `bucketMinutes must be a positive integer, got ${bucketMinutes}`,
    );
  }

  if (MINUTES_PER_DAY % bucketMinutes !== 0) {
    throw new Error(
      `bucketMinutes must evenly divide ${MINUTES_PER_DAY}, got ${bucketMinutes}`,
    );
  }

  if (!isValidTimezone(timezone)) {
    throw new Error(`Unknown timezone: ${timezone}`);
  }

  return {
    bucketMinutes,
    bucketsPerDay: MINUTES_PER_DAY / bucketMinutes,
    timezone,
  };
}

/**
 * Converts minutes since local midnight to the bucket index containing them.
 *
 * @param minutesIntoDay - Minutes into the day, in range [0, 1439]
 * @throws Error if minutesIntoDay is out of range
 */
export function minutesToBucketIndex(
  layout: BucketLayout,
  minutesIntoDay: number,
): number {
  if (
    !Number.isInteger(minutesIntoDay) ||
    minutesIntoDay < 0 ||
    minutesIntoDay >= MINUTES_PER_DAY
  ) {
    throw new Error(
      `minutesIntoDay must be an integer in range [0, ${MINUTES_PER_DAY - 1}], got ${minutesIntoDay}`,
    );
  }

  return Math.floor(minutesIntoDay / layout.bucketMinutes);
}

/**
 * Formats the start time of a bucket as HH:MM.
 *
 * @example
 * bucketIndexToLabel(createBucketLayout(15, 'UTC'), 5) // '01:15'
 */
export function bucketIndexToLabel(
  layout: BucketLayout,
  bucketIndex: number,
): string {
  if (
    !Number.isInteger(bucketIndex) ||
    bucketIndex < 0 ||
    bucketIndex >= layout.bucketsPerDay
  ) {
    throw new Error(
      `bucketIndex must be an integer in range [0, ${layout.bucketsPerDay - 1}], got ${bucketIndex}`,
    );
  }

  const startMinute = bucketIndex * layout.bucketMinutes;
  const hours = Math.floor(startMinute / MINUTES_PER_HOUR);
  const minutes = startMinute % MINUTES_PER_HOUR;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}
