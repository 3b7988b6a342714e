/**
 * OHLC series restricted to the date range of the run that produced a result.
 */

import { ValidationError } from '@backtest-lab/utils';
import type { BacktestResult, Candle } from '@backtest-lab/core';
import { parseIsoDate } from '../time/index.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Bars within [start_date 00:00, end_date 23:59:59.999] UTC, in time order
 */
export function sliceOhlcForRun(
  candles: readonly Candle[],
  result: Pick<BacktestResult, 'startDate' | 'endDate'>
): Candle[] {
  const start = parseIsoDate(result.startDate);
  const end = parseIsoDate(result.endDate);
  if (start === null || end === null) {
    throw new ValidationError('Result carries an invalid date range', {
      startDate: result.startDate,
      endDate: result.endDate,
    });
  }

  const last = end + MS_PER_DAY - 1;
  return candles
    .filter((c) => c.timestamp >= start && c.timestamp <= last)
    .sort((a, b) => a.timestamp - b.timestamp);
}
