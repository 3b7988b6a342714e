import { describe, it, expect } from 'vitest';
import { ValidationError } from '@backtest-lab/utils';
import {
  MovingAverageCrossStrategy,
  TopVolumeStrategy,
  ValuePortfolioStrategy,
} from '@backtest-lab/simulation';
import type { BacktestBaseArgs } from '../../../src/command-defs/backtest.js';
import { JsonFileMarketData, parseDataset } from '../../../src/data/json-market-data.js';
import { buildBacktestRequest, toConfigOverrides } from '../../../src/handlers/backtest/request.js';
import { createStrategy } from '../../../src/handlers/backtest/strategy-factory.js';

const DAY = 86_400_000;

const baseArgs: BacktestBaseArgs = {
  data: 'market.json',
  strategy: 'value',
  params: {},
  from: '2024-01-01',
  to: '2024-01-31',
  format: 'table',
};

function bar(timestamp: string) {
  return { timestamp, open: 10, high: 10, low: 10, close: 10 };
}

function dataset(symbols: string[]): JsonFileMarketData {
  const bars = Object.fromEntries(symbols.map((symbol) => [symbol, [bar('2024-01-02')]]));
  return new JsonFileMarketData(parseDataset({ bars }), 'memory.json');
}

describe('toConfigOverrides', () => {
  it('should set only the flags that were given', () => {
    expect(toConfigOverrides(baseArgs)).toEqual({});
    expect(toConfigOverrides({ ...baseArgs, capital: 5_000, slippage: 0 })).toEqual({
      initialCapital: 5_000,
      slippage: 0,
    });
  });

  it('should nest commission flags', () => {
    expect(toConfigOverrides({ ...baseArgs, commissionRate: 0 })).toEqual({ commission: { rate: 0 } });
    expect(toConfigOverrides({ ...baseArgs, commissionRate: 0.001, minCommission: 1 })).toEqual({
      commission: { rate: 0.001, minimum: 1 },
    });
  });
});

describe('buildBacktestRequest', () => {
  const value = new ValuePortfolioStrategy();

  it('should cover the whole end day for a date-only --to', () => {
    const request = buildBacktestRequest(baseArgs, value, dataset(['AAA']), {});

    expect(request.startDate).toBe(Date.UTC(2024, 0, 1));
    expect(request.endDate).toBe(Date.UTC(2024, 0, 31) + DAY - 1);
  });

  it('should keep a full timestamp --to as given', () => {
    const request = buildBacktestRequest({ ...baseArgs, to: '2024-01-31T12:00:00Z' }, value, dataset(['AAA']), {});
    expect(request.endDate).toBe(Date.UTC(2024, 0, 31, 12));
  });

  it('should layer flags over environment values', () => {
    const request = buildBacktestRequest({ ...baseArgs, slippage: 0.002 }, value, dataset(['AAA']), {
      BACKTEST_INITIAL_CAPITAL: '50000',
      BACKTEST_SLIPPAGE: '0.01',
    });

    expect(request.config?.initialCapital).toBe(50_000);
    expect(request.config?.slippage).toBe(0.002);
  });

  it('should hand the dataset to portfolio strategies', () => {
    const data = dataset(['AAA', 'BBB']);
    const request = buildBacktestRequest(baseArgs, value, data, {});

    expect(request.dataSource).toBe(data);
    expect(request.symbol).toBeUndefined();
  });

  it('should pick the only instrument for a single-instrument strategy', () => {
    const request = buildBacktestRequest(baseArgs, new MovingAverageCrossStrategy(), dataset(['AAA']), {});
    expect(request.symbol).toBe('AAA');
  });

  it('should prefer --symbol for a single-instrument strategy', () => {
    const request = buildBacktestRequest(
      { ...baseArgs, symbol: 'BBB' },
      new MovingAverageCrossStrategy(),
      dataset(['AAA', 'BBB']),
      {}
    );
    expect(request.symbol).toBe('BBB');
  });

  it('should require --symbol when the dataset has several instruments', () => {
    expect(() =>
      buildBacktestRequest(baseArgs, new MovingAverageCrossStrategy(), dataset(['AAA', 'BBB']), {})
    ).toThrow('MovingAverageCross trades one instrument; pass --symbol');
  });

  it('should reject an invalid date', () => {
    expect(() => buildBacktestRequest({ ...baseArgs, from: 'soon' }, value, dataset(['AAA']), {})).toThrow(
      ValidationError
    );
    expect(() => buildBacktestRequest({ ...baseArgs, from: 'soon' }, value, dataset(['AAA']), {})).toThrow(
      'Invalid date for --from: soon'
    );
  });
});

describe('createStrategy', () => {
  it('should build each bundled strategy with its parameters', () => {
    const topVolume = createStrategy('top-volume', { maxStocks: 3 });
    expect(topVolume).toBeInstanceOf(TopVolumeStrategy);
    expect(topVolume.name).toBe('TopVolume');

    expect(createStrategy('value', {})).toBeInstanceOf(ValuePortfolioStrategy);
    expect(createStrategy('ma-cross', { shortPeriod: 2, longPeriod: 3 })).toBeInstanceOf(MovingAverageCrossStrategy);
  });

  it('should reject invalid parameters', () => {
    expect(() => createStrategy('ma-cross', { shortPeriod: 5, longPeriod: 5 })).toThrow(ValidationError);
  });
});
