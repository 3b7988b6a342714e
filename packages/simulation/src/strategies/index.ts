/**
 * Bundled strategies
 */

export { TopVolumeStrategy, TopVolumeParamsSchema, type TopVolumeParams } from './top-volume.js';
export {
  ValuePortfolioStrategy,
  ValuePortfolioParamsSchema,
  type ValuePortfolioParams,
} from './value-portfolio.js';
export {
  MovingAverageCrossStrategy,
  MovingAverageCrossParamsSchema,
  type MovingAverageCrossParams,
} from './ma-cross.js';
export { equalWeights, topByVolumeAmount, parseStrategyParams } from './shared.js';
