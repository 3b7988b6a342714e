/**
 * @backtest-lab/simulation - Backtest Engine
 * ==========================================
 *
 * Replays historical market data against a strategy and reduces the run to
 * performance metrics.
 *
 * ## Architecture
 *
 * - **ledger/**: FIFO lot matching, completed trades
 * - **position/**: cash and positions, rebalance order planning
 * - **execution/**: bar execution model, slippage and commission
 * - **metrics/**: equity and trade statistics
 * - **data/**: market data cache, in-memory source, session calendar
 * - **engine/**: the run loop (single-instrument and portfolio modes)
 * - **strategies/**: bundled example strategies
 * - **batch/**: parameter grids and bounded-concurrency batch runs
 * - **report/**: result payloads for the presentation layer
 *
 * ## Quick Start
 *
 * ```typescript
 * import { BacktestEngine, InMemoryMarketData, TopVolumeStrategy } from '@backtest-lab/simulation';
 *
 * const engine = new BacktestEngine();
 * const { result } = await engine.run({
 *   strategy: new TopVolumeStrategy({ maxStocks: 5 }),
 *   startDate: Date.UTC(2024, 0, 1),
 *   endDate: Date.UTC(2024, 11, 31),
 *   dataSource: new InMemoryMarketData({ snapshots, bars }),
 * });
 * ```
 */

export * from './config.js';
export * from './ledger/index.js';
export * from './position/index.js';
export * from './execution/index.js';
export * from './metrics/index.js';
export * from './data/index.js';
export * from './engine/index.js';
export * from './strategies/index.js';
export * from './batch/index.js';
export * from './report/index.js';
export { calculateSMA, detectCross, type CrossDirection } from './indicators/moving-averages.js';
export {
  holdingPeriodDays,
  parseIsoDate,
  startOfUtcDay,
  toIsoDate,
  weekdaySessions,
} from './time/index.js';
export { logger } from './logger.js';
