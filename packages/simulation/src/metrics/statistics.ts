/**
 * Return and trade statistics
 * ===========================
 * Pure reductions over number series. Every function returns a finite
 * number for empty or degenerate input, except `profitFactor`, which is
 * Infinity whenever there is no gross loss.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Population standard deviation
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * r[t] = equity[t] / equity[t-1] - 1, one entry fewer than the input
 */
export function periodicReturns(equity: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < equity.length; i++) {
    const previous = equity[i - 1];
    returns.push(previous > 0 ? equity[i] / previous - 1 : 0);
  }
  return returns;
}

/**
 * Largest peak-to-trough decline as a positive fraction (0.25 = 25%)
 */
export function maxDrawdown(equity: readonly number[]): number {
  let peak = Number.NEGATIVE_INFINITY;
  let maxDD = 0;

  for (const value of equity) {
    if (value > peak) {
      peak = value;
    }
    if (peak > 0) {
      const drawdown = 1 - value / peak;
      if (drawdown > maxDD) {
        maxDD = drawdown;
      }
    }
  }

  return maxDD;
}

/**
 * Annualized Sharpe ratio: (mean(r) - rf / ppy) / std(r) x sqrt(ppy).
 * Zero for fewer than two returns or a flat series.
 */
export function sharpeRatio(
  returns: readonly number[],
  periodsPerYear: number,
  riskFreeRate: number = 0
): number {
  if (returns.length < 2) return 0;
  const std = standardDeviation(returns);
  if (std === 0 || !Number.isFinite(std)) return 0;
  return ((mean(returns) - riskFreeRate / periodsPerYear) / std) * Math.sqrt(periodsPerYear);
}

/**
 * Percentage of strictly positive values, 0 when empty
 */
export function winRate(pnls: readonly number[]): number {
  if (pnls.length === 0) return 0;
  return (pnls.filter((p) => p > 0).length / pnls.length) * 100;
}

/**
 * Gross profit / gross loss
 */
export function profitFactor(pnls: readonly number[]): number {
  let grossProfit = 0;
  let grossLoss = 0;
  for (const pnl of pnls) {
    if (pnl > 0) grossProfit += pnl;
    else if (pnl < 0) grossLoss -= pnl;
  }
  if (grossLoss === 0) {
    return Number.POSITIVE_INFINITY;
  }
  return grossProfit / grossLoss;
}

export function averageWin(pnls: readonly number[]): number {
  return mean(pnls.filter((p) => p > 0));
}

/**
 * Mean losing pnl (negative), 0 when there are no losses
 */
export function averageLoss(pnls: readonly number[]): number {
  return mean(pnls.filter((p) => p < 0));
}

/**
 * Longest runs of wins and losses in sequence order; a flat trade breaks both
 */
export function maxConsecutive(pnls: readonly number[]): { wins: number; losses: number } {
  let wins = 0;
  let losses = 0;
  let currentWins = 0;
  let currentLosses = 0;

  for (const pnl of pnls) {
    if (pnl > 0) {
      currentWins++;
      currentLosses = 0;
    } else if (pnl < 0) {
      currentLosses++;
      currentWins = 0;
    } else {
      currentWins = 0;
      currentLosses = 0;
    }
    wins = Math.max(wins, currentWins);
    losses = Math.max(losses, currentLosses);
  }

  return { wins, losses };
}
