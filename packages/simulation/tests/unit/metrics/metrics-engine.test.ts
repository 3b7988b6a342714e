import { describe, it, expect } from 'vitest';
import { ValidationError } from '@backtest-lab/utils';
import type { CompletedTrade, EquitySample, Fill } from '@backtest-lab/core';
import { FifoLedger } from '../../../src/ledger/index.js';
import {
  maxConsecutive,
  maxDrawdown,
  profitFactor,
  reduceMetrics,
  sharpeRatio,
  validateEquitySeries,
} from '../../../src/metrics/index.js';

const DAY = 24 * 60 * 60 * 1000;
const D1 = Date.UTC(2024, 0, 2);

function samples(values: number[]): EquitySample[] {
  return values.map((equity, i) => ({ timestamp: D1 + i * DAY, equity }));
}

function roundTrip(symbol: string, quantity: number, entry: number, exit: number): CompletedTrade[] {
  const ledger = new FifoLedger();
  const base: Omit<Fill, 'fillId' | 'side' | 'price' | 'timestamp'> = {
    orderId: `${symbol}-o`,
    symbol,
    quantity,
    commission: 0,
  };
  ledger.applyFill({ ...base, fillId: `${symbol}-1`, side: 'buy', price: entry, timestamp: D1 });
  return ledger.applyFill({ ...base, fillId: `${symbol}-2`, side: 'sell', price: exit, timestamp: D1 + DAY });
}

describe('reduceMetrics', () => {
  describe('two-instrument round trips', () => {
    const tradesA = roundTrip('A', 100, 100, 110);
    const tradesB = roundTrip('B', 50, 200, 190);
    const summary = reduceMetrics([...tradesA, ...tradesB], samples([100_000, 101_000, 100_500]), 100_000);

    it('should compute trade-level pnl and return', () => {
      expect(tradesA[0].pnl).toBe(1_000);
      expect(tradesA[0].returnPct).toBeCloseTo(10, 10);
      expect(tradesB[0].pnl).toBe(-500);
      expect(tradesB[0].returnPct).toBeCloseTo(-5, 10);
    });

    it('should compute portfolio win rate and profit factor', () => {
      expect(summary.winRate).toBe(50);
      expect(summary.profitFactor).toBe(2);
      expect(summary.totalTrades).toBe(2);
      expect(summary.avgWin).toBe(1_000);
      expect(summary.avgLoss).toBe(-500);
    });

    it('should report one performance per traded instrument, sorted by symbol', () => {
      expect(summary.symbolPerformances.map((p) => p.symbol)).toEqual(['A', 'B']);
      const [a, b] = summary.symbolPerformances;
      expect(a).toMatchObject({ tradeCount: 1, winRate: 100, profitFactor: Infinity, totalPnl: 1_000 });
      expect(a.totalReturn).toBeCloseTo(1, 10);
      expect(b).toMatchObject({ tradeCount: 1, winRate: 0, profitFactor: 0, totalPnl: -500 });
      expect(b.totalReturn).toBeCloseTo(-0.5, 10);
      expect(a.avgHoldingPeriod).toBe(1);
    });

    it('should derive equity statistics from the samples', () => {
      expect(summary.finalEquity).toBe(100_500);
      expect(summary.totalReturn).toBeCloseTo(0.005, 12);
      expect(summary.mdd).toBeCloseTo(500 / 101_000, 12);
      expect(summary.equityCurve).toEqual([100_000, 101_000, 100_500]);
      expect(summary.equityTimestamps).toEqual([D1, D1 + DAY, D1 + 2 * DAY]);
    });
  });

  it('should fall back to initial capital with no samples', () => {
    const summary = reduceMetrics([], [], 50_000);
    expect(summary.finalEquity).toBe(50_000);
    expect(summary.totalReturn).toBe(0);
    expect(summary.sharpeRatio).toBe(0);
    expect(summary.winRate).toBe(0);
    expect(summary.profitFactor).toBe(Infinity);
    expect(summary.symbolPerformances).toEqual([]);
  });

  it('should produce identical output for identical input', () => {
    const trades = [...roundTrip('B', 5, 10, 12), ...roundTrip('A', 3, 10, 9)];
    const series = samples([1_000, 1_010, 990, 1_020]);

    const first = JSON.stringify(reduceMetrics(trades, series, 1_000));
    const second = JSON.stringify(reduceMetrics(trades, series, 1_000));
    expect(second).toBe(first);
  });

  it('should not mutate its input', () => {
    const trades = roundTrip('A', 3, 10, 9);
    const copy = JSON.parse(JSON.stringify(trades));
    reduceMetrics(trades, samples([100, 99]), 100);
    expect(trades).toEqual(copy);
  });

  it('should reject equity series that are not strictly increasing in time', () => {
    const series = [
      { timestamp: D1, equity: 100 },
      { timestamp: D1, equity: 101 },
    ];
    expect(() => reduceMetrics([], series, 100)).toThrow(ValidationError);
    expect(() => validateEquitySeries(samples([1, 2, 3]))).not.toThrow();
  });
});

describe('statistics', () => {
  it('should report zero Sharpe for flat equity', () => {
    expect(sharpeRatio([0, 0, 0], 252)).toBe(0);
    expect(reduceMetrics([], samples([100, 100, 100]), 100).sharpeRatio).toBe(0);
  });

  it('should report zero Sharpe for a single return', () => {
    expect(sharpeRatio([0.1], 252)).toBe(0);
  });

  it('should annualize Sharpe with population standard deviation', () => {
    // returns 0.1, 0.1, -0.1: mean 1/30, std sqrt(0.08 / 9)
    const summary = reduceMetrics([], samples([100, 110, 121, 108.9]), 100);
    expect(summary.sharpeRatio).toBeCloseTo(Math.sqrt(31.5), 6);
  });

  it('should subtract the per-period risk-free rate', () => {
    const returns = [0.01, 0.03];
    // mean 0.02, std 0.01, rf per period 0.01
    expect(sharpeRatio(returns, 4, 0.04)).toBeCloseTo(2, 10);
  });

  it('should measure drawdown from the running peak', () => {
    expect(maxDrawdown([100, 120, 90, 130, 117])).toBeCloseTo(0.25, 12);
    expect(maxDrawdown([100, 110, 120])).toBe(0);
  });

  it('should report infinite profit factor whenever there is no gross loss', () => {
    expect(profitFactor([5, 10])).toBe(Infinity);
    expect(profitFactor([])).toBe(Infinity);
    expect(profitFactor([0])).toBe(Infinity);
    expect(profitFactor([-4, 0])).toBe(0);
    expect(profitFactor([30, -10, -5])).toBe(2);
  });

  it('should report infinite profit factor for an instrument that only broke even', () => {
    const flat = roundTrip('C', 10, 50, 50);
    const summary = reduceMetrics(flat, samples([10_000, 10_000]), 10_000);

    expect(flat[0].pnl).toBe(0);
    expect(summary.profitFactor).toBe(Infinity);
    expect(summary.symbolPerformances[0]).toMatchObject({ symbol: 'C', tradeCount: 1, winRate: 0, profitFactor: Infinity });
  });

  it('should count the longest win and loss streaks', () => {
    expect(maxConsecutive([10, 20, -5, 0, -1, -2, -3, 4])).toEqual({ wins: 2, losses: 3 });
  });
});
