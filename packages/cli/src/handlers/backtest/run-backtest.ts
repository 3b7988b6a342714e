/**
 * Run Backtest Handler
 *
 * Runs one backtest over a JSON dataset and returns the result payload.
 */

import { toBacktestResultPayload, type BacktestResultPayload } from '@backtest-lab/simulation';
import type { CommandContext } from '../../core/command-context.js';
import type { BacktestRunArgs } from '../../command-defs/backtest.js';
import { createStrategy } from './strategy-factory.js';
import { buildBacktestRequest } from './request.js';

export async function runBacktestHandler(
  args: BacktestRunArgs,
  ctx: CommandContext
): Promise<BacktestResultPayload> {
  const dataset = await ctx.services.loadDataset(args.data);
  const strategy = createStrategy(args.strategy, args.params);
  const request = buildBacktestRequest(args, strategy, dataset);

  const { result } = await ctx.services.engine().run(request);
  return toBacktestResultPayload(result);
}
