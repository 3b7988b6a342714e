/**
 * Engine Module
 */

export {
  BacktestEngine,
  type BacktestRequest,
  type BacktestRunOptions,
  type BacktestRunOutput,
  type BacktestEngineDeps,
} from './backtest-engine.js';
export { DiagnosticsCollector } from './diagnostics.js';
export { RunState } from './run-state.js';
export { sanitizeTargetWeights, type SanitizedWeights } from './weights.js';
