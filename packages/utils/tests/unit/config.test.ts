import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../src/errors.js';
import { getBacktestEnv, getLoggingConfig } from '../../src/config/index.js';

describe('getLoggingConfig', () => {
  it('should default to debug on the console outside production', () => {
    expect(getLoggingConfig({})).toEqual({
      level: 'debug',
      enableConsole: true,
      enableFile: false,
      logDir: 'logs',
      maxFiles: '14d',
      maxSize: '20m',
      production: false,
      test: false,
    });
  });

  it('should default to info in production', () => {
    const config = getLoggingConfig({ NODE_ENV: 'production' });
    expect(config.level).toBe('info');
    expect(config.production).toBe(true);
  });

  it('should read flags and treat empty values as unset', () => {
    const config = getLoggingConfig({ LOG_LEVEL: 'warn', LOG_FILE: '1', LOG_CONSOLE: 'false', LOG_DIR: '' });

    expect(config.level).toBe('warn');
    expect(config.enableFile).toBe(true);
    expect(config.enableConsole).toBe(false);
    expect(config.logDir).toBe('logs');
  });

  it('should reject an unknown level', () => {
    expect(() => getLoggingConfig({ LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
  });
});

describe('getBacktestEnv', () => {
  it('should omit unset variables', () => {
    expect(getBacktestEnv({})).toEqual({});
  });

  it('should coerce numeric variables', () => {
    expect(
      getBacktestEnv({ BACKTEST_INITIAL_CAPITAL: '50000', BACKTEST_SLIPPAGE: ' 0.002 ', BACKTEST_TRADE_PRICE: 'vwap' })
    ).toEqual({ BACKTEST_INITIAL_CAPITAL: 50_000, BACKTEST_SLIPPAGE: 0.002, BACKTEST_TRADE_PRICE: 'vwap' });
  });

  it('should name the offending variable', () => {
    let caught: unknown;
    try {
      getBacktestEnv({ BACKTEST_SLIPPAGE: 'lots' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ context: { configKey: 'BACKTEST_SLIPPAGE' } });
  });
});
