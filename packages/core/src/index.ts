/**
 * @backtest-lab/core
 *
 * Foundational, shared types and interfaces for the backtest engine.
 * This package has zero dependencies on other @backtest-lab packages.
 */

export * from './domain/trading.js';
export * from './domain/market.js';
export * from './domain/strategy.js';
export * from './domain/results.js';
export * from './ports/index.js';
