/**
 * Metrics Module
 */

export * from './statistics.js';
export {
  reduceMetrics,
  summarizeSymbol,
  summarizeSymbols,
  validateEquitySeries,
  type MetricsOptions,
} from './metrics-engine.js';
