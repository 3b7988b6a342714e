/**
 * Backtest result shapes
 *
 * Return and rate fields follow two conventions:
 * - portfolio `totalReturn` and `mdd` are fractions (0.12 = 12%)
 * - `winRate`, `returnPct` and per-symbol `totalReturn` are percentages
 */

import type { BacktestMode } from './strategy.js';

export interface SymbolPerformance {
  symbol: string;
  /** Sum of trade pnl / initial capital * 100 */
  totalReturn: number;
  tradeCount: number;
  winRate: number;
  /** Infinity when the instrument has no losing trade */
  profitFactor: number;
  avgHoldingPeriod: number;
  totalPnl: number;
  avgWin: number;
  avgLoss: number;
}

export type WarningCode =
  | 'weight-clamped'
  | 'weights-exceed-one'
  | 'missing-price'
  | 'forced-liquidation'
  | 'ohlc-missing';

export interface EngineWarning {
  timestamp: number;
  code: WarningCode;
  symbol?: string;
  message: string;
}

export type RejectionReason = 'insufficient-cash' | 'position-limit' | 'no-price';

export interface OrderRejection {
  timestamp: number;
  symbol: string;
  quantity: number;
  reason: RejectionReason;
}

export interface MatchingViolation {
  timestamp: number;
  symbol: string;
  fillId: string;
  /** Quantity that opened a short lot without long exposure to close */
  quantity: number;
}

export interface RunDiagnostics {
  sessionsProcessed: number;
  skippedSessions: number;
  rejectedOrders: number;
  warnings: EngineWarning[];
  rejections: OrderRejection[];
  matchingViolations: MatchingViolation[];
}

export interface MetricsSummary {
  finalEquity: number;
  totalReturn: number;
  mdd: number;
  sharpeRatio: number;
  winRate: number;
  profitFactor: number;
  totalTrades: number;
  avgWin: number;
  avgLoss: number;
  maxConsecutiveWins: number;
  maxConsecutiveLosses: number;
  equityCurve: number[];
  equityTimestamps: number[];
  symbolPerformances: SymbolPerformance[];
}

export interface BacktestResult extends MetricsSummary {
  backtestId: string;
  strategyName: string;
  mode: BacktestMode;
  /** ISO dates (yyyy-MM-dd) */
  startDate: string;
  endDate: string;
  initialCapital: number;
  diagnostics: RunDiagnostics;
}
