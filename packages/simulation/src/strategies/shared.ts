/**
 * Helpers shared by the bundled strategies.
 */

import type { z } from 'zod';
import { ValidationError } from '@backtest-lab/utils';
import type { MarketSnapshot, TargetWeights } from '@backtest-lab/core';

/**
 * Validate strategy parameters, naming the strategy and field on failure
 */
export function parseStrategyParams<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  strategyName: string
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid ${strategyName} parameter ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'unknown'}`, {
      strategy: strategyName,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Instruments with positive traded value, largest first (ties by symbol)
 */
export function topByVolumeAmount(rows: MarketSnapshot, limit: number): string[] {
  return rows
    .filter((row) => row.volumeAmount > 0)
    .sort((a, b) => b.volumeAmount - a.volumeAmount || (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0))
    .slice(0, limit)
    .map((row) => row.symbol);
}

export function equalWeights(universe: readonly string[]): TargetWeights {
  const weights = new Map<string, number>();
  if (universe.length === 0) {
    return weights;
  }
  const weight = 1 / universe.length;
  for (const symbol of universe) {
    weights.set(symbol, weight);
  }
  return weights;
}
