import { z } from 'zod';
import { ConfigurationError, getBacktestEnv, type BacktestEnv } from '@backtest-lab/utils';
import type { HistoricalCacheOptions } from './data/historical-cache.js';

/**
 * Backtest configuration schemas.
 *
 * Every run is parameterised by one `BacktestConfig`. Defaults mirror a
 * domestic equity desk: 0.15% commission, 0.1% slippage, daily bars.
 */

export const TradePriceSchema = z.enum(['open', 'close', 'vwap']);

export const CommissionConfigSchema = z.object({
  /** Fraction of notional charged per fill */
  rate: z.number().min(0).max(1).default(0.0015),
  /** Floor per fill, in account currency */
  minimum: z.number().min(0).default(0),
});

export type CommissionConfig = z.infer<typeof CommissionConfigSchema>;

export const BacktestConfigSchema = z.object({
  initialCapital: z.number().positive().default(10_000_000),
  commission: CommissionConfigSchema.default({}),
  slippage: z.number().min(0).max(1).default(0.001),
  tradePrice: TradePriceSchema.default('close'),
  /** Orders with |delta| x price below this notional are dropped */
  minRebalanceCost: z.number().min(0).default(0),
  /** Cap on simultaneously held instruments; omitted = unlimited */
  maxPositions: z.number().int().positive().optional(),
  /** Cash below this after settlement forces full liquidation */
  minCash: z.number().default(0),
  /** Opening short lots is a normal operation rather than a recorded violation */
  allowShort: z.boolean().default(false),
  periodsPerYear: z.number().int().positive().default(252),
  /** Annual risk-free rate subtracted per period in the Sharpe ratio */
  riskFreeRate: z.number().min(0).max(1).default(0),
  /** Rebalance every N processed sessions (portfolio mode) */
  rebalanceEvery: z.number().int().positive().default(1),
  interval: z.enum(['1m', '5m', '15m', '1h', '1d']).default('1d'),
});

export type BacktestConfig = z.infer<typeof BacktestConfigSchema>;
export type BacktestConfigInput = z.input<typeof BacktestConfigSchema>;

export const DEFAULT_BACKTEST_CONFIG: BacktestConfig = BacktestConfigSchema.parse({});

/**
 * Parse a config, raising ConfigurationError on the first invalid field
 */
export function parseBacktestConfig(input: BacktestConfigInput = {}): BacktestConfig {
  const parsed = BacktestConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join('.') || 'config';
    throw new ConfigurationError(`Invalid backtest config ${key}: ${issue?.message ?? 'unknown'}`, key);
  }
  return parsed.data;
}

function envToConfigInput(env: BacktestEnv): BacktestConfigInput {
  const input: BacktestConfigInput = {};
  if (env.BACKTEST_INITIAL_CAPITAL !== undefined) input.initialCapital = env.BACKTEST_INITIAL_CAPITAL;
  if (env.BACKTEST_COMMISSION_RATE !== undefined || env.BACKTEST_MIN_COMMISSION !== undefined) {
    input.commission = {
      rate: env.BACKTEST_COMMISSION_RATE,
      minimum: env.BACKTEST_MIN_COMMISSION,
    };
  }
  if (env.BACKTEST_SLIPPAGE !== undefined) input.slippage = env.BACKTEST_SLIPPAGE;
  if (env.BACKTEST_TRADE_PRICE !== undefined) input.tradePrice = env.BACKTEST_TRADE_PRICE;
  if (env.BACKTEST_MIN_REBALANCE_COST !== undefined) {
    input.minRebalanceCost = env.BACKTEST_MIN_REBALANCE_COST;
  }
  if (env.BACKTEST_MAX_POSITIONS !== undefined) input.maxPositions = env.BACKTEST_MAX_POSITIONS;
  if (env.BACKTEST_MIN_CASH !== undefined) input.minCash = env.BACKTEST_MIN_CASH;
  if (env.BACKTEST_PERIODS_PER_YEAR !== undefined) input.periodsPerYear = env.BACKTEST_PERIODS_PER_YEAR;
  if (env.BACKTEST_RISK_FREE_RATE !== undefined) input.riskFreeRate = env.BACKTEST_RISK_FREE_RATE;
  return input;
}

/**
 * Layer explicit overrides over BACKTEST_* environment values over defaults
 */
export function loadBacktestConfig(
  overrides: BacktestConfigInput = {},
  env: Record<string, string | undefined> = process.env
): BacktestConfig {
  const fromEnv = envToConfigInput(getBacktestEnv(env));
  return parseBacktestConfig({
    ...fromEnv,
    ...overrides,
    commission: { ...fromEnv.commission, ...overrides.commission },
  });
}

/**
 * Cache bounds from BACKTEST_CACHE_MAX_ENTRIES and BACKTEST_CACHE_MAX_BARS;
 * unset variables leave the cache defaults in place
 */
export function loadHistoricalCacheOptions(
  env: Record<string, string | undefined> = process.env
): HistoricalCacheOptions {
  const values = getBacktestEnv(env);
  return {
    ...(values.BACKTEST_CACHE_MAX_ENTRIES !== undefined && { maxEntries: values.BACKTEST_CACHE_MAX_ENTRIES }),
    ...(values.BACKTEST_CACHE_MAX_BARS !== undefined && { maxRows: values.BACKTEST_CACHE_MAX_BARS }),
  };
}
