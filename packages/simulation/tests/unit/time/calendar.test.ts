import { describe, it, expect } from 'vitest';
import {
  holdingPeriodDays,
  parseIsoDate,
  startOfUtcDay,
  toIsoDate,
  weekdaySessions,
} from '../../../src/time/index.js';

describe('calendar helpers', () => {
  it('should floor holding periods to whole days', () => {
    expect(holdingPeriodDays(Date.UTC(2024, 0, 1), Date.UTC(2024, 0, 3, 12))).toBe(2);
    expect(holdingPeriodDays(Date.UTC(2024, 0, 1, 9), Date.UTC(2024, 0, 1, 15))).toBe(0);
  });

  it('should never report a negative holding period', () => {
    expect(holdingPeriodDays(Date.UTC(2024, 0, 3), Date.UTC(2024, 0, 1))).toBe(0);
  });

  it('should format and parse UTC dates', () => {
    expect(toIsoDate(Date.UTC(2024, 1, 29, 23, 59))).toBe('2024-02-29');
    expect(parseIsoDate('2024-01-02')).toBe(Date.UTC(2024, 0, 2));
    expect(parseIsoDate('2024-01-02T09:30:00Z')).toBe(Date.UTC(2024, 0, 2, 9, 30));
    expect(parseIsoDate('not a date')).toBeNull();
  });

  it('should truncate to the start of the UTC day', () => {
    expect(startOfUtcDay(Date.UTC(2024, 0, 2, 17, 45))).toBe(Date.UTC(2024, 0, 2));
  });

  it('should list weekdays only', () => {
    // Friday 2024-01-05 to Tuesday 2024-01-09
    expect(weekdaySessions(Date.UTC(2024, 0, 5), Date.UTC(2024, 0, 9, 12))).toEqual([
      Date.UTC(2024, 0, 5),
      Date.UTC(2024, 0, 8),
      Date.UTC(2024, 0, 9),
    ]);
    expect(weekdaySessions(Date.UTC(2024, 0, 6), Date.UTC(2024, 0, 7))).toEqual([]);
  });
});
