/**
 * Top Volume Strategy
 *
 * Holds the N instruments with the largest traded value, equally weighted.
 */

import { z } from 'zod';
import type {
  AccountSnapshot,
  MarketSnapshot,
  PortfolioStrategy,
  TargetWeights,
} from '@backtest-lab/core';
import { equalWeights, parseStrategyParams, topByVolumeAmount } from './shared.js';

export const TopVolumeParamsSchema = z.object({
  maxStocks: z.number().int().positive().default(10),
});

export type TopVolumeParams = z.infer<typeof TopVolumeParamsSchema>;

export class TopVolumeStrategy implements PortfolioStrategy {
  readonly name = 'TopVolume';
  readonly hasUniverseSelection = true;
  readonly params: TopVolumeParams;

  constructor(params: z.input<typeof TopVolumeParamsSchema> = {}) {
    this.params = parseStrategyParams(TopVolumeParamsSchema, params, this.name);
  }

  selectUniverse(_date: number, snapshot: MarketSnapshot): string[] {
    return topByVolumeAmount(snapshot, this.params.maxStocks);
  }

  getTargetWeights(
    universe: readonly string[],
    _snapshot: MarketSnapshot,
    _account: AccountSnapshot
  ): TargetWeights {
    return equalWeights(universe);
  }
}
