import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@backtest-lab/utils';
import {
  DEFAULT_BACKTEST_CONFIG,
  loadBacktestConfig,
  loadHistoricalCacheOptions,
  parseBacktestConfig,
} from '../../../src/config.js';

describe('parseBacktestConfig', () => {
  it('should fill every default', () => {
    const config = parseBacktestConfig();

    expect(config).toEqual(DEFAULT_BACKTEST_CONFIG);
    expect(config).toMatchObject({
      initialCapital: 10_000_000,
      commission: { rate: 0.0015, minimum: 0 },
      slippage: 0.001,
      tradePrice: 'close',
      minRebalanceCost: 0,
      minCash: 0,
      allowShort: false,
      periodsPerYear: 252,
      riskFreeRate: 0,
      rebalanceEvery: 1,
      interval: '1d',
    });
    expect(config.maxPositions).toBeUndefined();
  });

  it('should name the invalid key', () => {
    expect(() => parseBacktestConfig({ slippage: 2 })).toThrow(ConfigurationError);
    expect(() => parseBacktestConfig({ slippage: 2 })).toThrow(/^Invalid backtest config slippage: /);
    expect(() => parseBacktestConfig({ commission: { rate: -1 } })).toThrow(
      /^Invalid backtest config commission\.rate: /
    );
  });

  it('should reject non-positive capital', () => {
    expect(() => parseBacktestConfig({ initialCapital: 0 })).toThrow(/initialCapital/);
  });
});

describe('loadBacktestConfig', () => {
  it('should layer explicit overrides over environment values', () => {
    const config = loadBacktestConfig(
      { slippage: 0 },
      { BACKTEST_SLIPPAGE: '0.01', BACKTEST_COMMISSION_RATE: '0.002', BACKTEST_MAX_POSITIONS: '5' }
    );

    expect(config.slippage).toBe(0);
    expect(config.commission).toEqual({ rate: 0.002, minimum: 0 });
    expect(config.maxPositions).toBe(5);
  });

  it('should merge commission fields from both sources', () => {
    const config = loadBacktestConfig({ commission: { minimum: 5 } }, { BACKTEST_COMMISSION_RATE: '0.002' });
    expect(config.commission).toEqual({ rate: 0.002, minimum: 5 });
  });

  it('should fall back to defaults with an empty environment', () => {
    expect(loadBacktestConfig({}, {})).toEqual(DEFAULT_BACKTEST_CONFIG);
  });
});

describe('loadHistoricalCacheOptions', () => {
  it('should map the cache bounds from the environment', () => {
    expect(
      loadHistoricalCacheOptions({ BACKTEST_CACHE_MAX_ENTRIES: '50', BACKTEST_CACHE_MAX_BARS: '1000' })
    ).toEqual({ maxEntries: 50, maxRows: 1_000 });
  });

  it('should leave unset bounds to the cache defaults', () => {
    expect(loadHistoricalCacheOptions({})).toEqual({});
    expect(loadHistoricalCacheOptions({ BACKTEST_CACHE_MAX_BARS: '200' })).toEqual({ maxRows: 200 });
  });

  it('should reject a non-positive bound', () => {
    expect(() => loadHistoricalCacheOptions({ BACKTEST_CACHE_MAX_ENTRIES: '0' })).toThrow(ConfigurationError);
  });
});
