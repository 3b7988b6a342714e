/**
 * Market data shapes supplied by the historical-data collaborator.
 */

/**
 * OHLC bar. `timestamp` is the session open in UTC epoch milliseconds.
 */
export interface Candle {
  symbol: string;
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type CandleInterval = '1m' | '5m' | '15m' | '1h' | '1d';

/**
 * Point-in-time fields for one instrument on one date
 */
export interface MarketSnapshotRow {
  symbol: string;
  price: number;
  /** Traded value (price x volume) for the session */
  volumeAmount: number;
  per?: number;
  pbr?: number;
  roe?: number;
  marketCap?: number;
}

export type MarketSnapshot = MarketSnapshotRow[];

/**
 * Which bar field fills are priced at
 */
export type TradePricePolicy = 'open' | 'close' | 'vwap';
