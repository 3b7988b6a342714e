/**
 * Sweep Backtest Handler
 *
 * Runs one backtest per parameter-grid combination over a shared data cache
 * and returns one summary row per combination, in grid order. A combination
 * the strategy rejects fails its own row only.
 */

import { toError } from '@backtest-lab/utils';
import {
  generateParameterGrid,
  runBatch,
  type BatchJob,
  type BatchJobResult,
  type ParameterSet,
} from '@backtest-lab/simulation';
import type { CommandContext } from '../../core/command-context.js';
import type { BacktestSweepArgs } from '../../command-defs/backtest.js';
import { createStrategy } from './strategy-factory.js';
import { buildBacktestRequest } from './request.js';
import { logger } from '../../logger.js';

export interface SweepRow {
  job: string;
  params: string;
  status: 'fulfilled' | 'rejected';
  final_equity: number | null;
  total_return: number | null;
  sharpe_ratio: number | null;
  mdd: number | null;
  total_trades: number | null;
  error: string | null;
}

function rejectedRow(id: string, params: ParameterSet, error: Error): SweepRow {
  return {
    job: id,
    params: JSON.stringify(params),
    status: 'rejected',
    final_equity: null,
    total_return: null,
    sharpe_ratio: null,
    mdd: null,
    total_trades: null,
    error: error.message,
  };
}

function toRow(outcome: BatchJobResult, params: ParameterSet): SweepRow {
  if (outcome.status === 'rejected') {
    return rejectedRow(outcome.id, params, outcome.error);
  }
  const { result } = outcome.output;
  return {
    job: outcome.id,
    params: JSON.stringify(params),
    status: outcome.status,
    final_equity: result.finalEquity,
    total_return: result.totalReturn,
    sharpe_ratio: result.sharpeRatio,
    mdd: result.mdd,
    total_trades: result.totalTrades,
    error: null,
  };
}

export async function sweepBacktestHandler(args: BacktestSweepArgs, ctx: CommandContext): Promise<SweepRow[]> {
  const dataset = await ctx.services.loadDataset(args.data);
  const combinations = generateParameterGrid(args.grid);

  const rows = new Map<string, SweepRow>();
  const paramsById = new Map<string, ParameterSet>();
  const jobs: BatchJob[] = [];
  const ids = combinations.map((combination, i) => {
    const id = `sweep-${i + 1}`;
    paramsById.set(id, combination);
    try {
      const strategy = createStrategy(args.strategy, { ...args.params, ...combination });
      jobs.push({ id, request: buildBacktestRequest(args, strategy, dataset) });
    } catch (error) {
      rows.set(id, rejectedRow(id, combination, toError(error)));
    }
    return id;
  });

  const cache = ctx.services.dataCache();
  const results = await runBatch(jobs, { concurrency: args.concurrency, cache });
  for (const outcome of results) {
    rows.set(outcome.id, toRow(outcome, paramsById.get(outcome.id) ?? {}));
  }

  const { hits, misses, hitRate } = cache.getStats();
  const { size, rows: cachedRows } = cache.getCacheInfo();
  logger.info('Sweep finished', { combinations: ids.length, hits, misses, hitRate, cachedEntries: size, cachedRows });

  return ids.flatMap((id) => {
    const row = rows.get(id);
    return row ? [row] : [];
  });
}
