/**
 * Ports Barrel Export
 */

export type { MarketDataSource } from './marketDataPort.js';
export type { ClockPort } from './clockPort.js';
export { createSystemClock } from './clockPort.js';
