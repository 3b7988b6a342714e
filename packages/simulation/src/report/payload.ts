/**
 * Result payloads
 * ===============
 * snake_case boundary shape of a BacktestResult. Serialization through JSON
 * is lossless: the one non-JSON value, an infinite profit factor, travels as
 * the string "inf".
 */

import { z } from 'zod';
import { ValidationError } from '@backtest-lab/utils';
import type { BacktestResult, SymbolPerformance } from '@backtest-lab/core';

const INFINITE = 'inf';

const ProfitFactorSchema = z.union([z.number(), z.literal(INFINITE)]);

export const SymbolPerformancePayloadSchema = z.object({
  symbol: z.string(),
  total_return: z.number(),
  trade_count: z.number().int().nonnegative(),
  win_rate: z.number().min(0).max(100),
  profit_factor: ProfitFactorSchema,
  avg_holding_period: z.number().nonnegative(),
  total_pnl: z.number(),
  avg_win: z.number(),
  avg_loss: z.number(),
});

export const DiagnosticsPayloadSchema = z.object({
  sessions_processed: z.number().int().nonnegative(),
  skipped_sessions: z.number().int().nonnegative(),
  rejected_orders: z.number().int().nonnegative(),
  warnings: z.array(
    z.object({
      timestamp: z.number(),
      code: z.enum(['weight-clamped', 'weights-exceed-one', 'missing-price', 'forced-liquidation', 'ohlc-missing']),
      symbol: z.string().optional(),
      message: z.string(),
    })
  ),
  rejections: z.array(
    z.object({
      timestamp: z.number(),
      symbol: z.string(),
      quantity: z.number(),
      reason: z.enum(['insufficient-cash', 'position-limit', 'no-price']),
    })
  ),
  matching_violations: z.array(
    z.object({
      timestamp: z.number(),
      symbol: z.string(),
      fill_id: z.string(),
      quantity: z.number(),
    })
  ),
});

export const BacktestResultPayloadSchema = z
  .object({
    backtest_id: z.string().min(1),
    strategy_name: z.string(),
    mode: z.enum(['single', 'portfolio']),
    start_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    end_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    initial_capital: z.number().positive(),
    final_equity: z.number(),
    total_return: z.number(),
    mdd: z.number().min(0),
    sharpe_ratio: z.number(),
    win_rate: z.number().min(0).max(100),
    profit_factor: ProfitFactorSchema,
    total_trades: z.number().int().nonnegative(),
    avg_win: z.number(),
    avg_loss: z.number(),
    max_consecutive_wins: z.number().int().nonnegative(),
    max_consecutive_losses: z.number().int().nonnegative(),
    equity_curve: z.array(z.number()),
    equity_timestamps: z.array(z.number()),
    symbol_performances: z.array(SymbolPerformancePayloadSchema),
    diagnostics: DiagnosticsPayloadSchema,
  })
  .superRefine((payload, ctx) => {
    if (payload.equity_curve.length !== payload.equity_timestamps.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['equity_timestamps'],
        message: 'equity_curve and equity_timestamps differ in length',
      });
    }
    for (let i = 1; i < payload.equity_timestamps.length; i++) {
      if (payload.equity_timestamps[i] <= payload.equity_timestamps[i - 1]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['equity_timestamps', i],
          message: 'equity_timestamps must be strictly increasing',
        });
        return;
      }
    }
  });

export type SymbolPerformancePayload = z.infer<typeof SymbolPerformancePayloadSchema>;
export type BacktestResultPayload = z.infer<typeof BacktestResultPayloadSchema>;

function encodeProfitFactor(value: number): number | typeof INFINITE {
  return value === Number.POSITIVE_INFINITY ? INFINITE : value;
}

function decodeProfitFactor(value: number | typeof INFINITE): number {
  return value === INFINITE ? Number.POSITIVE_INFINITY : value;
}

export function toSymbolPerformancePayload(perf: SymbolPerformance): SymbolPerformancePayload {
  return {
    symbol: perf.symbol,
    total_return: perf.totalReturn,
    trade_count: perf.tradeCount,
    win_rate: perf.winRate,
    profit_factor: encodeProfitFactor(perf.profitFactor),
    avg_holding_period: perf.avgHoldingPeriod,
    total_pnl: perf.totalPnl,
    avg_win: perf.avgWin,
    avg_loss: perf.avgLoss,
  };
}

export function toBacktestResultPayload(result: BacktestResult): BacktestResultPayload {
  const { diagnostics } = result;
  return {
    backtest_id: result.backtestId,
    strategy_name: result.strategyName,
    mode: result.mode,
    start_date: result.startDate,
    end_date: result.endDate,
    initial_capital: result.initialCapital,
    final_equity: result.finalEquity,
    total_return: result.totalReturn,
    mdd: result.mdd,
    sharpe_ratio: result.sharpeRatio,
    win_rate: result.winRate,
    profit_factor: encodeProfitFactor(result.profitFactor),
    total_trades: result.totalTrades,
    avg_win: result.avgWin,
    avg_loss: result.avgLoss,
    max_consecutive_wins: result.maxConsecutiveWins,
    max_consecutive_losses: result.maxConsecutiveLosses,
    equity_curve: result.equityCurve.slice(),
    equity_timestamps: result.equityTimestamps.slice(),
    symbol_performances: result.symbolPerformances.map(toSymbolPerformancePayload),
    diagnostics: {
      sessions_processed: diagnostics.sessionsProcessed,
      skipped_sessions: diagnostics.skippedSessions,
      rejected_orders: diagnostics.rejectedOrders,
      warnings: diagnostics.warnings.map((w) => ({ ...w })),
      rejections: diagnostics.rejections.map((r) => ({ ...r })),
      matching_violations: diagnostics.matchingViolations.map((v) => ({
        timestamp: v.timestamp,
        symbol: v.symbol,
        fill_id: v.fillId,
        quantity: v.quantity,
      })),
    },
  };
}

/**
 * Validate a payload (e.g. parsed JSON) and restore the domain result
 */
export function parseBacktestResultPayload(input: unknown): BacktestResult {
  const parsed = BacktestResultPayloadSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid backtest result payload: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim(), {
      issues: parsed.error.issues,
    });
  }

  const p = parsed.data;
  return {
    backtestId: p.backtest_id,
    strategyName: p.strategy_name,
    mode: p.mode,
    startDate: p.start_date,
    endDate: p.end_date,
    initialCapital: p.initial_capital,
    finalEquity: p.final_equity,
    totalReturn: p.total_return,
    mdd: p.mdd,
    sharpeRatio: p.sharpe_ratio,
    winRate: p.win_rate,
    profitFactor: decodeProfitFactor(p.profit_factor),
    totalTrades: p.total_trades,
    avgWin: p.avg_win,
    avgLoss: p.avg_loss,
    maxConsecutiveWins: p.max_consecutive_wins,
    maxConsecutiveLosses: p.max_consecutive_losses,
    equityCurve: p.equity_curve,
    equityTimestamps: p.equity_timestamps,
    symbolPerformances: p.symbol_performances.map((s) => ({
      symbol: s.symbol,
      totalReturn: s.total_return,
      tradeCount: s.trade_count,
      winRate: s.win_rate,
      profitFactor: decodeProfitFactor(s.profit_factor),
      avgHoldingPeriod: s.avg_holding_period,
      totalPnl: s.total_pnl,
      avgWin: s.avg_win,
      avgLoss: s.avg_loss,
    })),
    diagnostics: {
      sessionsProcessed: p.diagnostics.sessions_processed,
      skippedSessions: p.diagnostics.skipped_sessions,
      rejectedOrders: p.diagnostics.rejected_orders,
      warnings: p.diagnostics.warnings,
      rejections: p.diagnostics.rejections,
      matchingViolations: p.diagnostics.matching_violations.map((v) => ({
        timestamp: v.timestamp,
        symbol: v.symbol,
        fillId: v.fill_id,
        quantity: v.quantity,
      })),
    },
  };
}
