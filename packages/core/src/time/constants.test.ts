import { describe, it, expect } from 'vitest';
import {
  DAYS_PER_WEEK,
  MINUTES_PER_DAY,
  MS_PER_MINUTE,
  WEEKDAY_LABELS,
} from './constants.js';

describe('time constants', () => {
  it('MINUTES_PER_DAY should be 1440', () => {
    expect(MINUTES_PER_DAY).toBe(1440);
  });

  it('MS_PER_MINUTE should be 60000', () => {
    expect(MS_PER_MINUTE).toBe(60000);
  });

  it('should label every day of the week, Monday first', () => {
    expect(WEEKDAY_LABELS).toHaveLength(DAYS_PER_WEEK);
    expect(WEEKDAY_LABELS[0]).toBe('Mon');
    expect(WEEKDAY_LABELS[6]).toBe('Sun');
  });
});
