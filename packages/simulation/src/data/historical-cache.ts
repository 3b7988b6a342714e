/**
 * Historical Data Cache
 * =====================
 * LRU cache for bar series and market snapshots shared by concurrent runs.
 *
 * - bounded by entry count and by total cached rows (bars or snapshot rows)
 * - concurrent requests for the same key share one load
 * - a failed load is never cached; an evicted entry is a plain miss
 *
 * Instances are passed explicitly into runs; there is no process-wide cache.
 */

import { LRUCache } from 'lru-cache';
import type { Candle, CandleInterval, MarketSnapshot } from '@backtest-lab/core';
import { logger } from '../logger.js';

type CacheEntry =
  | { kind: 'ohlc'; candles: Candle[] | null }
  | { kind: 'snapshot'; rows: MarketSnapshot };

export interface HistoricalCacheOptions {
  /** Maximum number of cached series/snapshots (default 2000) */
  maxEntries?: number;
  /** Maximum total cached rows across entries (default 5,000,000) */
  maxRows?: number;
  /** Optional time-to-live per entry, in ms */
  ttlMs?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  evictions: number;
  /** Requests served by an already running load */
  sharedLoads: number;
  hitRate: number;
}

export class HistoricalDataCache {
  private readonly entries: LRUCache<string, CacheEntry>;
  private readonly inflight = new Map<string, Promise<CacheEntry>>();
  private readonly stats: CacheStats = {
    hits: 0,
    misses: 0,
    sets: 0,
    evictions: 0,
    sharedLoads: 0,
    hitRate: 0,
  };

  constructor(options: HistoricalCacheOptions = {}) {
    const maxEntries = options.maxEntries ?? 2000;
    const maxRows = options.maxRows ?? 5_000_000;

    this.entries = new LRUCache<string, CacheEntry>({
      max: maxEntries,
      maxSize: maxRows,
      sizeCalculation: (entry) => Math.max(1, entryRows(entry)),
      dispose: (_entry, _key, reason) => {
        if (reason === 'evict') {
          this.stats.evictions++;
        }
      },
      ...(options.ttlMs !== undefined ? { ttl: options.ttlMs } : {}),
    });

    logger.debug('Historical data cache initialized', { maxEntries, maxRows });
  }

  /**
   * Bars for one instrument and range; undefined when the source has none
   */
  async getCandles(
    symbol: string,
    interval: CandleInterval,
    startDate: number,
    endDate: number,
    load: () => Promise<Candle[] | undefined>
  ): Promise<Candle[] | undefined> {
    const key = `ohlc:${symbol}:${interval}:${startDate}:${endDate}`;
    const entry = await this.resolve(key, async () => ({ kind: 'ohlc', candles: (await load()) ?? null }));
    if (entry.kind !== 'ohlc' || entry.candles === null) {
      return undefined;
    }
    return entry.candles.slice();
  }

  /**
   * Full (unfiltered) snapshot for one date
   */
  async getSnapshot(date: number, load: () => Promise<MarketSnapshot>): Promise<MarketSnapshot> {
    const entry = await this.resolve(`snapshot:${date}`, async () => ({ kind: 'snapshot', rows: await load() }));
    return entry.kind === 'snapshot' ? entry.rows.slice() : [];
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  clear(): void {
    this.entries.clear();
    logger.debug('Historical data cache cleared');
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  getCacheInfo(): { size: number; maxEntries: number; rows: number } {
    return {
      size: this.entries.size,
      maxEntries: this.entries.max,
      rows: this.entries.calculatedSize,
    };
  }

  private resolve(key: string, loader: () => Promise<CacheEntry>): Promise<CacheEntry> {
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      this.stats.hits++;
      this.updateHitRate();
      return Promise.resolve(cached);
    }

    const pending = this.inflight.get(key);
    if (pending) {
      this.stats.sharedLoads++;
      return pending;
    }

    this.stats.misses++;
    this.updateHitRate();

    const load = loader()
      .then((entry) => {
        this.entries.set(key, entry);
        this.stats.sets++;
        return entry;
      })
      .finally(() => {
        this.inflight.delete(key);
      });
    this.inflight.set(key, load);
    return load;
  }

  private updateHitRate(): void {
    const total = this.stats.hits + this.stats.misses;
    this.stats.hitRate = total > 0 ? (this.stats.hits / total) * 100 : 0;
  }
}

function entryRows(entry: CacheEntry): number {
  return entry.kind === 'ohlc' ? (entry.candles?.length ?? 0) : entry.rows.length;
}
