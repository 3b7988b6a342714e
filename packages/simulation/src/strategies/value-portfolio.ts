/**
 * Value Portfolio Strategy
 *
 * Filters on valuation and profitability, then holds the most traded
 * survivors in equal weight:
 * - 0 < PER < perMax
 * - 0 < PBR < pbrMax
 * - ROE > roeMin
 */

import { z } from 'zod';
import type {
  MarketSnapshot,
  MarketSnapshotRow,
  PortfolioStrategy,
  TargetWeights,
} from '@backtest-lab/core';
import { equalWeights, parseStrategyParams, topByVolumeAmount } from './shared.js';

export const ValuePortfolioParamsSchema = z.object({
  perMax: z.number().positive().default(10),
  pbrMax: z.number().positive().default(1),
  roeMin: z.number().default(10),
  maxStocks: z.number().int().positive().default(20),
});

export type ValuePortfolioParams = z.infer<typeof ValuePortfolioParamsSchema>;

export class ValuePortfolioStrategy implements PortfolioStrategy {
  readonly name = 'ValuePortfolio';
  readonly hasUniverseSelection = true;
  readonly params: ValuePortfolioParams;

  constructor(params: z.input<typeof ValuePortfolioParamsSchema> = {}) {
    this.params = parseStrategyParams(ValuePortfolioParamsSchema, params, this.name);
  }

  selectUniverse(_date: number, snapshot: MarketSnapshot): string[] {
    return topByVolumeAmount(
      snapshot.filter((row) => this.isValue(row)),
      this.params.maxStocks
    );
  }

  getTargetWeights(universe: readonly string[]): TargetWeights {
    return equalWeights(universe);
  }

  private isValue(row: MarketSnapshotRow): boolean {
    const { per, pbr, roe } = row;
    if (per === undefined || pbr === undefined || roe === undefined) {
      return false;
    }
    return per > 0 && per < this.params.perMax && pbr > 0 && pbr < this.params.pbrMax && roe > this.params.roeMin;
  }
}
