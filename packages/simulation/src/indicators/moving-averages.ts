/**
 * Moving Average Indicators
 * =========================
 * Simple moving average over bar closes.
 */

import type { Candle } from '@backtest-lab/core';

/**
 * Simple moving average of closes ending at `index`, or null while the
 * window is not yet full
 */
export function calculateSMA(
  candles: readonly Candle[],
  period: number,
  index: number
): number | null {
  if (period <= 0 || index < period - 1 || index >= candles.length) {
    return null;
  }

  let sum = 0;
  for (let i = index - period + 1; i <= index; i++) {
    sum += candles[i].close;
  }
  return sum / period;
}

export type CrossDirection = 'golden' | 'dead' | null;

/**
 * Cross of the fast average over the slow one between `index - 1` and `index`
 */
export function detectCross(
  candles: readonly Candle[],
  fastPeriod: number,
  slowPeriod: number,
  index: number
): CrossDirection {
  const fast = calculateSMA(candles, fastPeriod, index);
  const slow = calculateSMA(candles, slowPeriod, index);
  const prevFast = calculateSMA(candles, fastPeriod, index - 1);
  const prevSlow = calculateSMA(candles, slowPeriod, index - 1);

  if (fast === null || slow === null || prevFast === null || prevSlow === null) {
    return null;
  }
  if (prevFast <= prevSlow && fast > slow) {
    return 'golden';
  }
  if (prevFast >= prevSlow && fast < slow) {
    return 'dead';
  }
  return null;
}
