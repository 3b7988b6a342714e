/**
 * Session calendar: the ordered trading dates a portfolio run iterates.
 */

import type { MarketDataSource } from '@backtest-lab/core';
import { startOfUtcDay, weekdaySessions } from '../time/index.js';

/**
 * Trading dates in [startDate, endDate], ascending and de-duplicated.
 * Uses the source's own calendar when it has one, weekdays otherwise.
 */
export async function resolveSessions(
  source: MarketDataSource,
  startDate: number,
  endDate: number
): Promise<number[]> {
  if (!source.getTradingDays) {
    return weekdaySessions(startDate, endDate);
  }

  const first = startOfUtcDay(startDate);
  const last = startOfUtcDay(endDate);
  const days = await source.getTradingDays(startDate, endDate);
  const unique = new Set<number>();
  for (const day of days) {
    const normalized = startOfUtcDay(day);
    if (normalized >= first && normalized <= last) {
      unique.add(normalized);
    }
  }
  return Array.from(unique).sort((a, b) => a - b);
}
