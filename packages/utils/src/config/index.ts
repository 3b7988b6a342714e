/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration objects for logging and the backtest runner.
 * Values are validated with zod; a bad value raises ConfigurationError naming
 * the offending variable.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const LoggingEnvSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'trace']).optional(),
  LOG_CONSOLE: booleanFlag.optional(),
  LOG_FILE: booleanFlag.optional(),
  LOG_DIR: z.string().min(1).optional(),
  LOG_MAX_FILES: z.string().min(1).optional(),
  LOG_MAX_SIZE: z.string().min(1).optional(),
  NODE_ENV: z.string().optional(),
});

export interface LoggingConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
  production: boolean;
  test: boolean;
}

export const BacktestEnvSchema = z.object({
  BACKTEST_INITIAL_CAPITAL: z.coerce.number().positive().optional(),
  BACKTEST_COMMISSION_RATE: z.coerce.number().min(0).max(1).optional(),
  BACKTEST_MIN_COMMISSION: z.coerce.number().min(0).optional(),
  BACKTEST_SLIPPAGE: z.coerce.number().min(0).max(1).optional(),
  BACKTEST_TRADE_PRICE: z.enum(['open', 'close', 'vwap']).optional(),
  BACKTEST_MIN_REBALANCE_COST: z.coerce.number().min(0).optional(),
  BACKTEST_MAX_POSITIONS: z.coerce.number().int().positive().optional(),
  BACKTEST_MIN_CASH: z.coerce.number().optional(),
  BACKTEST_PERIODS_PER_YEAR: z.coerce.number().int().positive().optional(),
  BACKTEST_RISK_FREE_RATE: z.coerce.number().min(0).max(1).optional(),
  BACKTEST_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().optional(),
  BACKTEST_CACHE_MAX_BARS: z.coerce.number().int().positive().optional(),
});

export type BacktestEnv = z.infer<typeof BacktestEnvSchema>;

type Env = Record<string, string | undefined>;

/**
 * Drop empty strings so `FOO=` behaves like an unset variable
 */
function pickDefined(env: Env, keys: readonly string[]): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      picked[key] = value.trim();
    }
  }
  return picked;
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, keys: readonly string[], env: Env): z.infer<T> {
  const parsed = schema.safeParse(pickDefined(env, keys));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join('.') || 'environment';
    throw new ConfigurationError(`Invalid value for ${key}: ${issue?.message ?? 'unknown'}`, key);
  }
  return parsed.data;
}

/**
 * Load logging configuration from environment variables
 */
export function getLoggingConfig(env: Env = process.env): LoggingConfig {
  const values = parseEnv(LoggingEnvSchema, Object.keys(LoggingEnvSchema.shape), env);
  const production = values.NODE_ENV === 'production';

  return {
    level: values.LOG_LEVEL ?? (production ? 'info' : 'debug'),
    enableConsole: values.LOG_CONSOLE ?? true,
    enableFile: values.LOG_FILE ?? false,
    logDir: values.LOG_DIR ?? 'logs',
    maxFiles: values.LOG_MAX_FILES ?? '14d',
    maxSize: values.LOG_MAX_SIZE ?? '20m',
    production,
    test: values.NODE_ENV === 'test',
  };
}

/**
 * Load BACKTEST_* overrides from environment variables.
 * Unset variables are omitted, so callers can layer defaults underneath.
 */
export function getBacktestEnv(env: Env = process.env): BacktestEnv {
  return parseEnv(BacktestEnvSchema, Object.keys(BacktestEnvSchema.shape), env);
}
