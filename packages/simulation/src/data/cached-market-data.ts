/**
 * Cached Market Data
 * ==================
 * MarketDataSource decorator that serves repeat requests from a
 * HistoricalDataCache. Bar misses for one call are fetched from the
 * underlying source in a single batch.
 */

import type { Candle, CandleInterval, MarketDataSource, MarketSnapshot } from '@backtest-lab/core';
import { HistoricalDataCache } from './historical-cache.js';

export class CachedMarketData implements MarketDataSource {
  /** Present only when the underlying source has a calendar */
  readonly getTradingDays?: (startDate: number, endDate: number) => Promise<number[]>;

  constructor(
    private readonly source: MarketDataSource,
    private readonly cache: HistoricalDataCache
  ) {
    const tradingDays = source.getTradingDays?.bind(source);
    if (tradingDays) {
      this.getTradingDays = tradingDays;
    }
  }

  getCache(): HistoricalDataCache {
    return this.cache;
  }

  async getMarketSnapshot(date: number, instrumentFilter?: readonly string[]): Promise<MarketSnapshot> {
    const rows = await this.cache.getSnapshot(date, () => this.source.getMarketSnapshot(date));
    if (instrumentFilter === undefined) {
      return rows;
    }
    const wanted = new Set(instrumentFilter);
    return rows.filter((row) => wanted.has(row.symbol));
  }

  async getMultiOHLC(
    symbols: readonly string[],
    interval: CandleInterval,
    startDate: number,
    endDate: number
  ): Promise<Map<string, Candle[]>> {
    const missed: string[] = [];
    let batch: Promise<Map<string, Candle[]>> | undefined;

    // Loaders run synchronously up to their first await, so every miss is
    // registered before the deferred batch request goes out.
    const fetchBatch = (): Promise<Map<string, Candle[]>> => {
      if (!batch) {
        batch = Promise.resolve().then(() => this.source.getMultiOHLC(missed, interval, startDate, endDate));
      }
      return batch;
    };

    const series = await Promise.all(
      symbols.map((symbol) =>
        this.cache.getCandles(symbol, interval, startDate, endDate, async () => {
          missed.push(symbol);
          const loaded = await fetchBatch();
          return loaded.get(symbol);
        })
      )
    );

    const result = new Map<string, Candle[]>();
    symbols.forEach((symbol, i) => {
      const candles = series[i];
      if (candles !== undefined) {
        result.set(symbol, candles);
      }
    });
    return result;
  }
}
