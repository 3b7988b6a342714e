import { z } from 'zod';

/**
 * Bundled strategies selectable from the command line
 */
export const strategyNameSchema = z.enum(['top-volume', 'value', 'ma-cross']);

export type StrategyName = z.infer<typeof strategyNameSchema>;

export const outputFormatSchema = z.enum(['json', 'table']).default('table');

const strategyParamsSchema = z.record(z.string(), z.unknown()).default({});

/**
 * Flags shared by every backtest command. Numeric flags arrive from
 * commander as strings.
 */
const backtestBaseSchema = z.object({
  data: z.string().min(1),
  strategy: strategyNameSchema,
  params: strategyParamsSchema,
  from: z.string().min(1),
  to: z.string().min(1),
  capital: z.coerce.number().positive().optional(),
  commissionRate: z.coerce.number().min(0).max(1).optional(),
  minCommission: z.coerce.number().min(0).optional(),
  slippage: z.coerce.number().min(0).max(1).optional(),
  tradePrice: z.enum(['open', 'close', 'vwap']).optional(),
  maxPositions: z.coerce.number().int().positive().optional(),
  minRebalanceCost: z.coerce.number().min(0).optional(),
  rebalanceEvery: z.coerce.number().int().positive().optional(),
  allowShort: z.boolean().optional(),
  symbol: z.string().min(1).optional(),
  format: outputFormatSchema,
});

export type BacktestBaseArgs = z.infer<typeof backtestBaseSchema>;

/**
 * Backtest run schema
 */
export const backtestRunSchema = backtestBaseSchema;

export type BacktestRunArgs = z.infer<typeof backtestRunSchema>;

const gridValueSchema = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Parameter sweep schema: one run per grid combination, merged over --params
 */
export const backtestSweepSchema = backtestBaseSchema.extend({
  grid: z.record(z.string(), z.array(gridValueSchema).min(1)),
  concurrency: z.coerce.number().int().min(1).max(64).default(4),
});

export type BacktestSweepArgs = z.infer<typeof backtestSweepSchema>;
