/**
 * Target weight sanitation.
 *
 * Weights outside [0, 1] are clamped one by one. A total above 1 is reported
 * but never renormalized: the cash check in order planning decides which buys
 * go through.
 */

import type { EngineWarning, TargetWeights } from '@backtest-lab/core';

const SUM_TOLERANCE = 1e-9;

export interface SanitizedWeights {
  weights: Map<string, number>;
  warnings: EngineWarning[];
}

export function sanitizeTargetWeights(target: TargetWeights, timestamp: number): SanitizedWeights {
  const weights = new Map<string, number>();
  const warnings: EngineWarning[] = [];
  let total = 0;

  for (const [symbol, raw] of target) {
    let weight = raw;
    if (!Number.isFinite(raw) || raw < 0) {
      weight = 0;
    } else if (raw > 1) {
      weight = 1;
    }
    if (weight !== raw) {
      warnings.push({
        timestamp,
        code: 'weight-clamped',
        symbol,
        message: `Target weight ${raw} for ${symbol} clamped to ${weight}`,
      });
    }
    weights.set(symbol, weight);
    total += weight;
  }

  if (total > 1 + SUM_TOLERANCE) {
    warnings.push({
      timestamp,
      code: 'weights-exceed-one',
      message: `Target weights sum to ${Number(total.toFixed(6))}; buys are limited by available cash`,
    });
  }

  return { weights, warnings };
}
