/**
 * Batch Runner
 * ============
 * Runs independent backtests with a bounded number in flight. Every job gets
 * its own engine; jobs share only the (optional) historical data cache.
 *
 * A failed job is logged and reported in its slot; it never aborts the batch.
 */

import { toError } from '@backtest-lab/utils';
import { CachedMarketData, type HistoricalDataCache } from '../data/index.js';
import {
  BacktestEngine,
  type BacktestEngineDeps,
  type BacktestRequest,
  type BacktestRunOutput,
} from '../engine/index.js';
import { logger } from '../logger.js';

export interface BatchJob {
  id: string;
  request: BacktestRequest;
}

export type BatchJobResult =
  | { id: string; status: 'fulfilled'; output: BacktestRunOutput }
  | { id: string; status: 'rejected'; error: Error };

export interface BatchRunOptions {
  /** Jobs in flight at once (default 4) */
  concurrency?: number;
  /** Shared across jobs: each job's data source is read through it */
  cache?: HistoricalDataCache;
  signal?: AbortSignal;
  engineDeps?: BacktestEngineDeps;
}

/**
 * Results come back in job order
 */
export async function runBatch(
  jobs: readonly BatchJob[],
  options: BatchRunOptions = {}
): Promise<BatchJobResult[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 4));
  const results: BatchJobResult[] = [];
  const startedAt = Date.now();

  logger.info('Batch started', { jobs: jobs.length, concurrency });

  for (let i = 0; i < jobs.length; i += concurrency) {
    const batch = jobs.slice(i, i + concurrency);
    const settled = await Promise.all(batch.map((job) => runJob(job, options)));
    results.push(...settled);
  }

  const failed = results.filter((r) => r.status === 'rejected').length;
  logger.info('Batch complete', {
    jobs: jobs.length,
    failed,
    durationMs: Date.now() - startedAt,
    cache: options.cache?.getStats(),
  });

  return results;
}

async function runJob(job: BatchJob, options: BatchRunOptions): Promise<BatchJobResult> {
  const engine = new BacktestEngine(options.engineDeps);
  const { dataSource } = job.request;
  const request: BacktestRequest = {
    ...job.request,
    backtestId: job.request.backtestId ?? job.id,
    dataSource: dataSource && options.cache ? new CachedMarketData(dataSource, options.cache) : dataSource,
  };

  try {
    const output = await engine.run(request, { signal: options.signal });
    return { id: job.id, status: 'fulfilled', output };
  } catch (error) {
    const err = toError(error);
    logger.warn('Batch job failed', { jobId: job.id, error: err.message });
    return { id: job.id, status: 'rejected', error: err };
  }
}
