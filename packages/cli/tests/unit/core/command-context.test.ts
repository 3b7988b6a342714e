import { describe, it, expect } from 'vitest';
import { BacktestEngine } from '@backtest-lab/simulation';
import { CommandContext } from '../../../src/core/command-context.js';

describe('CommandContext', () => {
  it('should size the shared data cache from BACKTEST_CACHE_* settings', () => {
    const ctx = new CommandContext({
      env: { BACKTEST_CACHE_MAX_ENTRIES: '25', BACKTEST_CACHE_MAX_BARS: '500' },
      write: () => undefined,
    });

    const cache = ctx.services.dataCache();
    expect(cache.getCacheInfo()).toEqual({ size: 0, maxEntries: 25, rows: 0 });
    expect(ctx.services.dataCache()).toBe(cache);
  });

  it('should fall back to the cache defaults when nothing is set', () => {
    const ctx = new CommandContext({ env: {}, write: () => undefined });

    expect(ctx.services.dataCache().getCacheInfo().maxEntries).toBe(2_000);
  });

  it('should reuse an injected engine', () => {
    const engine = new BacktestEngine();
    const ctx = new CommandContext({ engineOverride: engine, write: () => undefined });

    expect(ctx.services.engine()).toBe(engine);
  });
});
