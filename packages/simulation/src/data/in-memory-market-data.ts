/**
 * In-memory market data
 * =====================
 * MarketDataSource over preloaded snapshots and bars. Snapshots are keyed by
 * session date (UTC midnight); bars are stored as given, whatever the
 * requested interval.
 */

import type { Candle, CandleInterval, MarketDataSource, MarketSnapshot } from '@backtest-lab/core';
import { startOfUtcDay } from '../time/index.js';

export interface InMemoryDataset {
  snapshots: ReadonlyMap<number, MarketSnapshot>;
  bars: ReadonlyMap<string, readonly Candle[]>;
}

export class InMemoryMarketData implements MarketDataSource {
  private readonly snapshots = new Map<number, MarketSnapshot>();
  private readonly bars = new Map<string, Candle[]>();

  constructor(dataset: InMemoryDataset) {
    for (const [date, rows] of dataset.snapshots) {
      this.snapshots.set(startOfUtcDay(date), rows.map((row) => ({ ...row })));
    }
    for (const [symbol, candles] of dataset.bars) {
      this.bars.set(
        symbol,
        [...candles].sort((a, b) => a.timestamp - b.timestamp)
      );
    }
  }

  async getMarketSnapshot(date: number, instrumentFilter?: readonly string[]): Promise<MarketSnapshot> {
    const rows = this.snapshots.get(startOfUtcDay(date)) ?? [];
    const wanted = instrumentFilter ? new Set(instrumentFilter) : undefined;
    return rows.filter((row) => !wanted || wanted.has(row.symbol)).map((row) => ({ ...row }));
  }

  async getMultiOHLC(
    symbols: readonly string[],
    _interval: CandleInterval,
    startDate: number,
    endDate: number
  ): Promise<Map<string, Candle[]>> {
    const result = new Map<string, Candle[]>();
    for (const symbol of symbols) {
      const candles = this.bars.get(symbol);
      if (!candles) continue;
      const inRange = candles.filter((c) => c.timestamp >= startDate && c.timestamp <= endDate);
      if (inRange.length > 0) {
        result.set(symbol, inRange.map((c) => ({ ...c })));
      }
    }
    return result;
  }

  /**
   * Every date that has a snapshot or a bar, within range
   */
  async getTradingDays(startDate: number, endDate: number): Promise<number[]> {
    const first = startOfUtcDay(startDate);
    const last = startOfUtcDay(endDate);
    const days = new Set<number>();

    for (const date of this.snapshots.keys()) {
      if (date >= first && date <= last) days.add(date);
    }
    for (const candles of this.bars.values()) {
      for (const candle of candles) {
        const day = startOfUtcDay(candle.timestamp);
        if (day >= first && day <= last) days.add(day);
      }
    }

    return Array.from(days).sort((a, b) => a - b);
  }

  symbols(): string[] {
    return Array.from(this.bars.keys());
  }
}
