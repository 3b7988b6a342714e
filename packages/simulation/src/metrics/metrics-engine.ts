/**
 * Metrics Engine
 * ==============
 * Reduces a frozen trade list and equity series into a MetricsSummary.
 *
 * The reduction is pure: it never mutates its input, and identical input
 * yields an identical summary (same field order, same values).
 */

import { ValidationError } from '@backtest-lab/utils';
import type {
  CompletedTrade,
  EquitySample,
  MetricsSummary,
  SymbolPerformance,
} from '@backtest-lab/core';
import {
  averageLoss,
  averageWin,
  maxConsecutive,
  maxDrawdown,
  mean,
  periodicReturns,
  profitFactor,
  sharpeRatio,
  winRate,
} from './statistics.js';

export interface MetricsOptions {
  periodsPerYear?: number;
  /** Annual rate */
  riskFreeRate?: number;
}

/**
 * Equity timestamps must be strictly increasing and values finite
 */
export function validateEquitySeries(samples: readonly EquitySample[]): void {
  for (let i = 0; i < samples.length; i++) {
    const sample = samples[i];
    if (!Number.isFinite(sample.equity)) {
      throw new ValidationError('Equity sample is not finite', { index: i, timestamp: sample.timestamp });
    }
    if (i > 0 && sample.timestamp <= samples[i - 1].timestamp) {
      throw new ValidationError('Equity timestamps must be strictly increasing', {
        index: i,
        timestamp: sample.timestamp,
        previous: samples[i - 1].timestamp,
      });
    }
  }
}

/**
 * Per-instrument statistics. totalReturn = sum(pnl) / initialCapital x 100,
 * so it can be recomputed from the trade list alone.
 */
export function summarizeSymbol(
  symbol: string,
  trades: readonly CompletedTrade[],
  initialCapital: number
): SymbolPerformance {
  const pnls = trades.map((t) => t.pnl);
  const totalPnl = pnls.reduce((sum, p) => sum + p, 0);

  return {
    symbol,
    totalReturn: initialCapital > 0 ? (totalPnl / initialCapital) * 100 : 0,
    tradeCount: trades.length,
    winRate: winRate(pnls),
    profitFactor: profitFactor(pnls),
    avgHoldingPeriod: mean(trades.map((t) => t.holdingPeriodDays)),
    totalPnl,
    avgWin: averageWin(pnls),
    avgLoss: averageLoss(pnls),
  };
}

function compareSymbols(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Group trades by instrument, one SymbolPerformance per instrument with a
 * trade, sorted by symbol
 */
export function summarizeSymbols(
  trades: readonly CompletedTrade[],
  initialCapital: number
): SymbolPerformance[] {
  const bySymbol = new Map<string, CompletedTrade[]>();
  for (const trade of trades) {
    const group = bySymbol.get(trade.symbol);
    if (group) {
      group.push(trade);
    } else {
      bySymbol.set(trade.symbol, [trade]);
    }
  }

  return Array.from(bySymbol.keys())
    .sort(compareSymbols)
    .map((symbol) => summarizeSymbol(symbol, bySymbol.get(symbol) ?? [], initialCapital));
}

export function reduceMetrics(
  trades: readonly CompletedTrade[],
  samples: readonly EquitySample[],
  initialCapital: number,
  options: MetricsOptions = {}
): MetricsSummary {
  validateEquitySeries(samples);

  const periodsPerYear = options.periodsPerYear ?? 252;
  const riskFreeRate = options.riskFreeRate ?? 0;

  const equityCurve = samples.map((s) => s.equity);
  const equityTimestamps = samples.map((s) => s.timestamp);
  const finalEquity = equityCurve.length > 0 ? equityCurve[equityCurve.length - 1] : initialCapital;

  const pnls = trades.map((t) => t.pnl);
  const streaks = maxConsecutive(pnls);

  return {
    finalEquity,
    totalReturn: initialCapital > 0 ? finalEquity / initialCapital - 1 : 0,
    mdd: maxDrawdown(equityCurve),
    sharpeRatio: sharpeRatio(periodicReturns(equityCurve), periodsPerYear, riskFreeRate),
    winRate: winRate(pnls),
    profitFactor: profitFactor(pnls),
    totalTrades: trades.length,
    avgWin: averageWin(pnls),
    avgLoss: averageLoss(pnls),
    maxConsecutiveWins: streaks.wins,
    maxConsecutiveLosses: streaks.losses,
    equityCurve,
    equityTimestamps,
    symbolPerformances: summarizeSymbols(trades, initialCapital),
  };
}
