/**
 * Command Context - Lazy service creation
 *
 * This is NOT a framework - just an object that knows how to create services.
 * Removes service instantiation from command files.
 */

import { BacktestEngine, HistoricalDataCache, loadHistoricalCacheOptions } from '@backtest-lab/simulation';
import { JsonFileMarketData } from '../data/json-market-data.js';

/**
 * Services available in command context
 */
export interface CommandServices {
  engine(): BacktestEngine;
  dataCache(): HistoricalDataCache;
  loadDataset(path: string): Promise<JsonFileMarketData>;
}

/**
 * Options for creating a CommandContext with service overrides
 */
export interface CommandContextOptions {
  engineOverride?: BacktestEngine;
  /** Receives each formatted command output (default: stdout) */
  write?: (text: string) => void;
  /** Source of BACKTEST_* settings (default: process.env) */
  env?: Record<string, string | undefined>;
}

export class CommandContext {
  readonly services: CommandServices;
  private readonly writer: (text: string) => void;
  private engineInstance?: BacktestEngine;
  private cacheInstance?: HistoricalDataCache;
  private readonly env: Record<string, string | undefined>;

  constructor(options: CommandContextOptions = {}) {
    this.env = options.env ?? process.env;
    this.writer = options.write ?? ((text) => process.stdout.write(`${text}\n`));
    this.engineInstance = options.engineOverride;

    this.services = {
      engine: () => {
        if (!this.engineInstance) {
          this.engineInstance = new BacktestEngine();
        }
        return this.engineInstance;
      },
      dataCache: () => {
        if (!this.cacheInstance) {
          this.cacheInstance = new HistoricalDataCache(loadHistoricalCacheOptions(this.env));
        }
        return this.cacheInstance;
      },
      loadDataset: (path) => JsonFileMarketData.load(path),
    };
  }

  write(text: string): void {
    this.writer(text);
  }
}
