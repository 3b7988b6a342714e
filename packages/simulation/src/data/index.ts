/**
 * Data Module Index
 * =================
 * Market data adapters, cache and session calendar.
 */

export {
  HistoricalDataCache,
  type HistoricalCacheOptions,
  type CacheStats,
} from './historical-cache.js';
export { CachedMarketData } from './cached-market-data.js';
export { InMemoryMarketData, type InMemoryDataset } from './in-memory-market-data.js';
export { resolveSessions } from './session-calendar.js';
