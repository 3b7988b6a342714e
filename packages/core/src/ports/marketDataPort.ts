/**
 * Market Data Port
 *
 * Port interface for the historical-data collaborator. The backtest engine
 * depends on this port, never on a concrete store; adapters (a JSON dataset,
 * a database repository, an in-memory fake) implement it.
 */

import type { Candle, CandleInterval, MarketSnapshot } from '../domain/market.js';

export interface MarketDataSource {
  /**
   * Per-instrument fields for `date`, optionally restricted to `instrumentFilter`.
   * Resolves to an empty array (not an error) when nothing exists for the date.
   */
  getMarketSnapshot(date: number, instrumentFilter?: readonly string[]): Promise<MarketSnapshot>;

  /**
   * Batch historical bars. Instruments without data are absent keys.
   */
  getMultiOHLC(
    symbols: readonly string[],
    interval: CandleInterval,
    startDate: number,
    endDate: number
  ): Promise<Map<string, Candle[]>>;

  /**
   * Trading session dates in [startDate, endDate], ascending.
   * Optional: the engine falls back to a weekday calendar.
   */
  getTradingDays?(startDate: number, endDate: number): Promise<number[]>;
}
