/**
 * Trading domain: fills, lots, completed round trips and positions.
 *
 * All timestamps are UTC epoch milliseconds.
 */

export type OrderSide = 'buy' | 'sell';

/**
 * Direction of an open lot: a long lot was opened by a buy, a short lot by a sell.
 */
export type LotSide = 'long' | 'short';

/**
 * One executed order leg
 */
export interface Fill {
  fillId: string;
  /** Originating order id */
  orderId: string;
  symbol: string;
  side: OrderSide;
  /** Always > 0 */
  quantity: number;
  /** Always > 0 */
  price: number;
  /** Always >= 0 */
  commission: number;
  timestamp: number;
}

/**
 * An open, unmatched quantity from a fill
 */
export interface Lot {
  symbol: string;
  side: LotSide;
  /** Remaining quantity, > 0 while the lot is open */
  quantity: number;
  entryPrice: number;
  entryTimestamp: number;
  /** Entry commission not yet allocated to a completed trade */
  entryCommission: number;
  fillId: string;
}

/**
 * A fully or partially closed round trip
 */
export interface CompletedTrade {
  symbol: string;
  side: LotSide;
  entryTimestamp: number;
  exitTimestamp: number;
  entryPrice: number;
  exitPrice: number;
  /** Matched quantity, > 0 */
  quantity: number;
  /** Realized pnl net of allocated commission */
  pnl: number;
  /** pnl / (entryPrice * quantity) * 100 */
  returnPct: number;
  holdingPeriodDays: number;
  /** Entry and exit commission allocated to this trade */
  commission: number;
  entryFillId: string;
  exitFillId: string;
}

/**
 * Current holding in one instrument
 */
export interface Position {
  symbol: string;
  /** Signed: negative when short */
  quantity: number;
  averageCost: number;
  realizedPnl: number;
  unrealizedPnl: number;
  lastPrice: number;
}

export interface AccountSnapshot {
  cash: number;
  /** cash + mark-to-market value of every position */
  equity: number;
  positions: Position[];
}

export interface EquitySample {
  timestamp: number;
  equity: number;
}

/**
 * Order signal emitted by a per-bar strategy
 */
export interface OrderSignal {
  symbol: string;
  side: OrderSide;
  quantity: number;
}

/**
 * An order the engine hands to the execution model
 */
export interface OrderRequest {
  orderId: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  timestamp: number;
}
