/**
 * @backtest-lab/cli - command-line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/command-context.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/execute.js';
export * from './core/coerce.js';
export * from './core/program.js';
export * from './data/json-market-data.js';
export * from './command-defs/backtest.js';
export { registerBacktestCommands, type RegisterBacktestOptions } from './commands/backtest.js';
export { runBacktestHandler } from './handlers/backtest/run-backtest.js';
export { sweepBacktestHandler, type SweepRow } from './handlers/backtest/sweep-backtest.js';
export { createStrategy } from './handlers/backtest/strategy-factory.js';
export { buildBacktestRequest, toConfigOverrides } from './handlers/backtest/request.js';
export * from './types/index.js';
