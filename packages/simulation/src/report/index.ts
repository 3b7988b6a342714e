/**
 * Report Module
 * =============
 * Boundary shapes for the presentation layer.
 */

export * from './payload.js';
export { buildSymbolDetail, type SymbolDetail } from './symbol-detail.js';
export { sliceOhlcForRun } from './ohlc-window.js';
