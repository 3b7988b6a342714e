/**
 * Translation of validated command arguments into an engine request.
 */

import { ValidationError } from '@backtest-lab/utils';
import { hasUniverseSelection, type Strategy } from '@backtest-lab/core';
import {
  loadBacktestConfig,
  parseIsoDate,
  type BacktestConfigInput,
  type BacktestRequest,
} from '@backtest-lab/simulation';
import type { BacktestBaseArgs } from '../../command-defs/backtest.js';
import type { JsonFileMarketData } from '../../data/json-market-data.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

function parseDateArg(value: string, flag: string): number {
  const parsed = parseIsoDate(value);
  if (parsed === null) {
    throw new ValidationError(`Invalid date for --${flag}: ${value}`, { flag, value });
  }
  return parsed;
}

/**
 * CLI flags over BACKTEST_* environment values over defaults
 */
export function toConfigOverrides(args: BacktestBaseArgs): BacktestConfigInput {
  const overrides: BacktestConfigInput = {};
  if (args.capital !== undefined) overrides.initialCapital = args.capital;
  if (args.commissionRate !== undefined || args.minCommission !== undefined) {
    overrides.commission = {
      ...(args.commissionRate !== undefined && { rate: args.commissionRate }),
      ...(args.minCommission !== undefined && { minimum: args.minCommission }),
    };
  }
  if (args.slippage !== undefined) overrides.slippage = args.slippage;
  if (args.tradePrice !== undefined) overrides.tradePrice = args.tradePrice;
  if (args.maxPositions !== undefined) overrides.maxPositions = args.maxPositions;
  if (args.minRebalanceCost !== undefined) overrides.minRebalanceCost = args.minRebalanceCost;
  if (args.rebalanceEvery !== undefined) overrides.rebalanceEvery = args.rebalanceEvery;
  if (args.allowShort !== undefined) overrides.allowShort = args.allowShort;
  return overrides;
}

export function buildBacktestRequest(
  args: BacktestBaseArgs,
  strategy: Strategy,
  dataset: JsonFileMarketData,
  env: Record<string, string | undefined> = process.env
): BacktestRequest {
  const startDate = parseDateArg(args.from, 'from');
  // a bare date covers the whole day
  const endDate = parseDateArg(args.to, 'to') + (DATE_ONLY.test(args.to) ? MS_PER_DAY - 1 : 0);
  const config = loadBacktestConfig(toConfigOverrides(args), env);

  if (hasUniverseSelection(strategy)) {
    return { strategy, startDate, endDate, config, dataSource: dataset };
  }

  const symbols = dataset.symbols();
  const symbol = args.symbol ?? (symbols.length === 1 ? symbols[0] : undefined);
  if (symbol === undefined) {
    throw new ValidationError(`${strategy.name} trades one instrument; pass --symbol`, {
      available: symbols,
    });
  }
  return { strategy, startDate, endDate, config, symbol, dataSource: dataset };
}
