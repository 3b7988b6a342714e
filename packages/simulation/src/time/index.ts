/**
 * Calendar helpers
 *
 * Domain timestamps are UTC epoch milliseconds; luxon does the calendar math.
 */

import { DateTime } from 'luxon';

function utc(timestamp: number): DateTime {
  return DateTime.fromMillis(timestamp, { zone: 'utc' });
}

/**
 * Whole days between entry and exit (floored, never negative)
 */
export function holdingPeriodDays(entryTimestamp: number, exitTimestamp: number): number {
  const days = utc(exitTimestamp).diff(utc(entryTimestamp), 'days').days;
  return Math.max(0, Math.floor(days));
}

export function startOfUtcDay(timestamp: number): number {
  return utc(timestamp).startOf('day').toMillis();
}

export function toIsoDate(timestamp: number): string {
  return utc(timestamp).toFormat('yyyy-MM-dd');
}

/**
 * Parse yyyy-MM-dd (or a full ISO timestamp) into UTC epoch ms
 */
export function parseIsoDate(value: string): number | null {
  const parsed = DateTime.fromISO(value, { zone: 'utc' });
  return parsed.isValid ? parsed.toMillis() : null;
}

/**
 * Monday-to-Friday session dates in [startDate, endDate], at UTC midnight
 */
export function weekdaySessions(startDate: number, endDate: number): number[] {
  const sessions: number[] = [];
  const last = startOfUtcDay(endDate);
  for (let day = utc(startOfUtcDay(startDate)); day.toMillis() <= last; day = day.plus({ days: 1 })) {
    if (day.weekday <= 5) {
      sessions.push(day.toMillis());
    }
  }
  return sessions;
}
