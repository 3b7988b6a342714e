/**
 * Property Tests for the Metrics Reduction
 * ========================================
 *
 * Critical Invariants:
 * 1. Per-instrument total return is reproducible from that instrument's trades alone
 * 2. Win rate equals count(pnl > 0) / count(trades) x 100
 * 3. Every traded instrument appears exactly once; untraded ones never appear
 * 4. Drawdown is a fraction in [0, 1] for positive equity
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { CompletedTrade } from '@backtest-lab/core';
import { maxDrawdown, reduceMetrics } from '../../src/metrics/index.js';

const INITIAL_CAPITAL = 1_000_000;

const tradeArb: fc.Arbitrary<CompletedTrade> = fc
  .record({
    symbol: fc.constantFrom('AAA', 'BBB', 'CCC', 'DDD'),
    quantity: fc.integer({ min: 1, max: 100 }),
    entryPrice: fc.integer({ min: 1, max: 1_000 }),
    exitPrice: fc.integer({ min: 1, max: 1_000 }),
    holdingPeriodDays: fc.integer({ min: 0, max: 60 }),
  })
  .map((t): CompletedTrade => {
    const pnl = (t.exitPrice - t.entryPrice) * t.quantity;
    return {
      symbol: t.symbol,
      side: 'long',
      entryTimestamp: 0,
      exitTimestamp: t.holdingPeriodDays * 86_400_000,
      entryPrice: t.entryPrice,
      exitPrice: t.exitPrice,
      quantity: t.quantity,
      pnl,
      returnPct: (pnl / (t.entryPrice * t.quantity)) * 100,
      holdingPeriodDays: t.holdingPeriodDays,
      commission: 0,
      entryFillId: 'e',
      exitFillId: 'x',
    };
  });

describe('Metrics Engine - Property Tests', () => {
  it('per-instrument total return is recomputable from its trades', () => {
    fc.assert(
      fc.property(fc.array(tradeArb, { maxLength: 60 }), (trades) => {
        const summary = reduceMetrics(trades, [], INITIAL_CAPITAL);
        for (const perf of summary.symbolPerformances) {
          const own = trades.filter((t) => t.symbol === perf.symbol);
          const expected = (own.reduce((sum, t) => sum + t.pnl, 0) / INITIAL_CAPITAL) * 100;
          expect(perf.totalReturn).toBeCloseTo(expected, 9);
          expect(perf.tradeCount).toBe(own.length);
        }
      }),
      { numRuns: 200 }
    );
  });

  it('win rate follows its formula for every instrument', () => {
    fc.assert(
      fc.property(fc.array(tradeArb, { minLength: 1, maxLength: 60 }), (trades) => {
        const summary = reduceMetrics(trades, [], INITIAL_CAPITAL);
        for (const perf of summary.symbolPerformances) {
          const own = trades.filter((t) => t.symbol === perf.symbol);
          const wins = own.filter((t) => t.pnl > 0).length;
          expect(perf.winRate).toBe((wins / own.length) * 100);
        }
      }),
      { numRuns: 200 }
    );
  });

  it('symbol performances cover exactly the traded instruments', () => {
    fc.assert(
      fc.property(fc.array(tradeArb, { maxLength: 60 }), (trades) => {
        const summary = reduceMetrics(trades, [], INITIAL_CAPITAL);
        const reported = summary.symbolPerformances.map((p) => p.symbol);
        const traded = [...new Set(trades.map((t) => t.symbol))].sort();
        return JSON.stringify(reported) === JSON.stringify(traded);
      }),
      { numRuns: 200 }
    );
  });

  it('drawdown stays within [0, 1] for positive equity', () => {
    fc.assert(
      fc.property(fc.array(fc.double({ min: 1, max: 1e9, noNaN: true }), { maxLength: 100 }), (equity) => {
        const mdd = maxDrawdown(equity);
        return mdd >= 0 && mdd <= 1;
      }),
      { numRuns: 200 }
    );
  });
});
