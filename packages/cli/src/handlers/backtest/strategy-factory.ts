/**
 * Builds a bundled strategy from its command-line name and raw parameters.
 */

import type { Strategy } from '@backtest-lab/core';
import {
  MovingAverageCrossParamsSchema,
  MovingAverageCrossStrategy,
  TopVolumeParamsSchema,
  TopVolumeStrategy,
  ValuePortfolioParamsSchema,
  ValuePortfolioStrategy,
  parseStrategyParams,
} from '@backtest-lab/simulation';
import type { StrategyName } from '../../command-defs/backtest.js';

export function createStrategy(name: StrategyName, params: Record<string, unknown>): Strategy {
  switch (name) {
    case 'top-volume':
      return new TopVolumeStrategy(parseStrategyParams(TopVolumeParamsSchema, params, 'TopVolume'));
    case 'value':
      return new ValuePortfolioStrategy(parseStrategyParams(ValuePortfolioParamsSchema, params, 'ValuePortfolio'));
    case 'ma-cross':
      return new MovingAverageCrossStrategy(
        parseStrategyParams(MovingAverageCrossParamsSchema, params, 'MovingAverageCross')
      );
  }
}
