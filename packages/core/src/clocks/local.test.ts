import { describe, it, expect } from 'vitest';
import {
  mapLocalToBucketKey,
  toLocalTimeParts,
  truncateToBucketStart,
} from './local.js';
import { createBucketLayout } from '../time/bucket.js';

describe('toLocalTimeParts', () => {
  it('should read Monday 00:00 in New York from 05:00 UTC', () => {
    // Monday, January 1, 2024 00:00:00 EST (UTC-5)
    const tsMs = new Date('2024-01-01T05:00:00Z').getTime();
    expect(toLocalTimeParts(tsMs, 'America/New_York')).toEqual({
      dayOfWeek: 0,
      minutesIntoDay: 0,
      secondsIntoMinute: 0,
      msIntoSecond: 0,
      localDate: '2024-01-01',
    });
  });

  it('should report the previous local date west of UTC', () => {
    // 2024-01-01T03:00Z is Sunday 22:00 in New York
    const tsMs = new Date('2024-01-01T03:00:00Z').getTime();
    const local = toLocalTimeParts(tsMs, 'America/New_York');
    expect(local.dayOfWeek).toBe(6);
    expect(local.minutesIntoDay).toBe(22 * 60);
    expect(local.localDate).toBe('2023-12-31');
  });

  it('should report midnight as minute 0, not 24:00', () => {
    const tsMs = new Date('2024-01-02T00:00:00Z').getTime();
    expect(toLocalTimeParts(tsMs, 'UTC').minutesIntoDay).toBe(0);
  });

  it('should keep seconds and milliseconds', () => {
    const tsMs = new Date('2024-01-01T10:20:30.456Z').getTime();
    const local = toLocalTimeParts(tsMs, 'UTC');
    expect(local.secondsIntoMinute).toBe(30);
    expect(local.msIntoSecond).toBe(456);
  });
});

describe('mapLocalToBucketKey', () => {
  it('should map Friday 12:00 New York to bucket 48 of day 4 for 15-minute buckets', () => {
    const layout = createBucketLayout(15, 'America/New_York');
    // Friday 12:00 EST
    const tsMs = new Date('2024-01-05T17:00:00Z').getTime();
    expect(mapLocalToBucketKey(tsMs, layout)).toEqual({
      dayOfWeek: 4,
      bucketIndex: 48,
    });
  });

  it('should differ between timezones by the offset difference', () => {
    const tsMs = new Date('2024-06-15T12:00:00Z').getTime();
    const ny = mapLocalToBucketKey(tsMs, createBucketLayout(60, 'America/New_York'));
    const la = mapLocalToBucketKey(tsMs, createBucketLayout(60, 'America/Los_Angeles'));
    // 08:00 EDT and 05:00 PDT, both Saturday
    expect(ny).toEqual({ dayOfWeek: 5, bucketIndex: 8 });
    expect(la).toEqual({ dayOfWeek: 5, bucketIndex: 5 });
  });
});

describe('truncateToBucketStart', () => {
  it('should truncate down to the bucket boundary', () => {
    const layout = createBucketLayout(15, 'UTC');
    const tsMs = new Date('2024-01-01T00:07:30.250Z').getTime();
    expect(truncateToBucketStart(tsMs, layout)).toBe(
      new Date('2024-01-01T00:00:00Z').getTime(),
    );
  });

  it('should leave an aligned instant unchanged', () => {
    const layout = createBucketLayout(15, 'UTC');
    const tsMs = new Date('2024-01-01T00:30:00Z').getTime();
    expect(truncateToBucketStart(tsMs, layout)).toBe(tsMs);
  });

  it('should align to local boundaries in a half-hour offset zone', () => {
    // Asia/Kolkata is UTC+05:30; 60-minute buckets start on the local hour
    const layout = createBucketLayout(60, 'Asia/Kolkata');
    const tsMs = new Date('2024-01-01T00:10:00Z').getTime(); // 05:40 local
    expect(truncateToBucketStart(tsMs, layout)).toBe(
      new Date('2023-12-31T23:30:00Z').getTime(), // 05:00 local
    );
  });
});
