/**
 * Order planning
 * ==============
 * Turns signed share deltas into the orders a session will actually send.
 *
 * Policy, applied in this order:
 * 1. sells first, in delta order, freeing cash
 * 2. buys in delta (strategy-reported) order
 * 3. a buy without a quote is rejected as `no-price`
 * 4. a buy opening a new instrument beyond `maxPositions` is rejected as `position-limit`
 * 5. a buy whose quoted cost would push projected cash below zero is rejected
 *    as `insufficient-cash`
 *
 * Rejected buys are never resized and never retried within the session.
 */

import type { OrderRejection, OrderSide } from '@backtest-lab/core';

export interface OrderQuote {
  /** Execution price including slippage */
  price: number;
  commission: number;
}

export type QuoteFn = (symbol: string, side: OrderSide, quantity: number) => OrderQuote | undefined;

export interface PlanContext {
  timestamp: number;
  cash: number;
  /** Signed held quantity per instrument */
  holdings: ReadonlyMap<string, number>;
  maxPositions?: number;
}

export interface PlannedOrder {
  symbol: string;
  side: OrderSide;
  quantity: number;
}

export interface OrderPlan {
  orders: PlannedOrder[];
  rejections: OrderRejection[];
  /** Cash after every planned order settles at its quoted price */
  projectedCash: number;
}

export function planOrders(
  deltas: Iterable<readonly [string, number]>,
  quote: QuoteFn,
  context: PlanContext
): OrderPlan {
  const entries = Array.from(deltas).filter(([, delta]) => delta !== 0 && Number.isFinite(delta));
  const orders: PlannedOrder[] = [];
  const rejections: OrderRejection[] = [];
  const held = new Map(context.holdings);
  let cash = context.cash;

  for (const [symbol, delta] of entries) {
    if (delta > 0) continue;
    const quantity = -delta;
    const quoted = quote(symbol, 'sell', quantity);
    if (!quoted) {
      rejections.push({ timestamp: context.timestamp, symbol, quantity, reason: 'no-price' });
      continue;
    }
    cash += quantity * quoted.price - quoted.commission;
    held.set(symbol, (held.get(symbol) ?? 0) - quantity);
    orders.push({ symbol, side: 'sell', quantity });
  }

  let heldCount = countHeld(held);

  for (const [symbol, delta] of entries) {
    if (delta < 0) continue;
    const quoted = quote(symbol, 'buy', delta);
    if (!quoted) {
      rejections.push({ timestamp: context.timestamp, symbol, quantity: delta, reason: 'no-price' });
      continue;
    }

    const opensNew = (held.get(symbol) ?? 0) === 0;
    if (opensNew && context.maxPositions !== undefined && heldCount >= context.maxPositions) {
      rejections.push({ timestamp: context.timestamp, symbol, quantity: delta, reason: 'position-limit' });
      continue;
    }

    const cost = delta * quoted.price + quoted.commission;
    if (cash - cost < 0) {
      rejections.push({ timestamp: context.timestamp, symbol, quantity: delta, reason: 'insufficient-cash' });
      continue;
    }

    cash -= cost;
    const after = (held.get(symbol) ?? 0) + delta;
    held.set(symbol, after);
    if (opensNew) heldCount++;
    else if (after === 0) heldCount--;
    orders.push({ symbol, side: 'buy', quantity: delta });
  }

  return { orders, rejections, projectedCash: cash };
}

function countHeld(holdings: ReadonlyMap<string, number>): number {
  let count = 0;
  for (const quantity of holdings.values()) {
    if (quantity !== 0) count++;
  }
  return count;
}
