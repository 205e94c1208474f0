/**
 * Calendar constants for time-of-week bucketing.
 *
 * Time is analyzed by time of week: seven days, each split into buckets of a
 * configurable number of minutes. The bucket width must divide a day evenly.
 */

export const DAYS_PER_WEEK = 7;

export const HOURS_PER_DAY = 24;

export const MINUTES_PER_HOUR = 60;

export const SECONDS_PER_MINUTE = 60;

export const MS_PER_SECOND = 1000;

/**
 * Number of minutes per day (1440).
 */
export const MINUTES_PER_DAY = HOURS_PER_DAY * MINUTES_PER_HOUR;

/**
 * Milliseconds per minute, for converting configured minute values to epoch offsets.
 */
export const MS_PER_MINUTE = SECONDS_PER_MINUTE * MS_PER_SECOND;

/**
 * Column labels for the seven days, Monday first.
 */
export const WEEKDAY_LABELS = [
  'Mon',
  'Tue',
  'Wed',
  'Thu',
  'Fri',
  'Sat',
  'Sun',
] as const;
