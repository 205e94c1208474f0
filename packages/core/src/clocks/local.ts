import {
  minutesToBucketIndex,
  type BucketKey,
  type BucketLayout,
  type DayOfWeek,
} from '../time/bucket.js';
import {
  MINUTES_PER_HOUR,
  MS_PER_MINUTE,
  MS_PER_SECOND,
} from '../time/constants.js';

/**
 * Wall-clock reading of an instant in a particular timezone.
 */
export interface LocalTimeParts {
  /** Day of week: 0 = Monday, 6 = Sunday */
  dayOfWeek: DayOfWeek;
  /** Minutes since local midnight, in range [0, 1439] */
  minutesIntoDay: number;
  secondsIntoMinute: number;
  msIntoSecond: number;
  /** Local calendar date as YYYY-MM-DD */
  localDate: string;
}

const WEEKDAY_MAP: Record<string, DayOfWeek> = {
  Mon: 0,
  Tue: 1,
  Wed: 2,
  Thu: 3,
  Fri: 4,
  Sat: 5,
  Sun: 6,
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (formatter === undefined) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      weekday: 'short',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

function readPart(
  parts: Intl.DateTimeFormatPart[],
  type: Intl.DateTimeFormatPartTypes,
): string {
  const value = parts.find((p) => p.type === type)?.value;
  if (value === undefined) {
    throw new Error(`Intl.DateTimeFormat produced no ${type} part`);
  }
  return value;
}

/**
 * Reads the local wall-clock time of a timestamp in the given timezone.
 *
 * @param tsMs - Timestamp in milliseconds since epoch
 * @param timezone - IANA timezone string
 */
export function toLocalTimeParts(tsMs: number, timezone: string): LocalTimeParts {
  const parts = formatterFor(timezone).formatToParts(new Date(tsMs));

  const weekday = readPart(parts, 'weekday');
  const dayOfWeek = WEEKDAY_MAP[weekday];
  if (dayOfWeek === undefined) {
    throw new Error(`Unrecognised weekday: ${weekday}`);
  }

  const hour = parseInt(readPart(parts, 'hour'), 10);
  const minute = parseInt(readPart(parts, 'minute'), 10);
  const second = parseInt(readPart(parts, 'second'), 10);

  return {
    dayOfWeek,
    minutesIntoDay: hour * MINUTES_PER_HOUR + minute,
    secondsIntoMinute: second,
    // zone offsets are whole minutes, so the sub-second part is the same everywhere
    msIntoSecond: ((tsMs % MS_PER_SECOND) + MS_PER_SECOND) % MS_PER_SECOND,
    localDate: `${readPart(parts, 'year')}-${readPart(parts, 'month')}-${readPart(parts, 'day')}`,
  };
}

/**
 * Maps a timestamp to the histogram cell it falls in, using local time.
 *
 * @param tsMs - Timestamp in milliseconds since epoch
 * @param layout - Bucket layout carrying bucket width and timezone
 */
export function mapLocalToBucketKey(tsMs: number, layout: BucketLayout): BucketKey {
  const local = toLocalTimeParts(tsMs, layout.timezone);
  return {
    dayOfWeek: local.dayOfWeek,
    bucketIndex: minutesToBucketIndex(layout, local.minutesIntoDay),
  };
}

/**
 * Returns the instant at which the local-time bucket containing tsMs begins.
 *
 * @example
 * // 15-minute buckets, UTC: 00:07:30 truncates to 00:00:00
 * truncateToBucketStart(Date.parse('2024-01-01T00:07:30Z'), layout)
 */
export function truncateToBucketStart(tsMs: number, layout: BucketLayout): number {
  const local = toLocalTimeParts(tsMs, layout.timezone);
  const minutesIntoBucket = local.minutesIntoDay % layout.bucketMinutes;
  const offsetMs =
    minutesIntoBucket * MS_PER_MINUTE +
    local.secondsIntoMinute * MS_PER_SECOND +
    local.msIntoSecond;
  return tsMs - offsetMs;
}
