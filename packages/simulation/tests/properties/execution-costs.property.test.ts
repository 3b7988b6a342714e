/**
 * Property Tests for Bar Execution Costs
 * ======================================
 *
 * Critical Invariants:
 * 1. Slippage always works against the trader: buys pay at least the
 *    reference price, sells receive at most it
 * 2. Commission is max(minimum, notional x rate) on the executed notional
 * 3. A fill carries the quoted price and commission
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { Candle, OrderSide } from '@backtest-lab/core';
import { BarExecutionModel } from '../../src/execution/index.js';

const priceArb = fc.double({ min: 0.01, max: 1_000_000, noNaN: true });
const sideArb = fc.constantFrom<OrderSide>('buy', 'sell');

function bar(close: number): Candle {
  return { symbol: 'AAA', timestamp: 0, open: close, high: close, low: close, close, volume: 1 };
}

describe('Bar execution cost properties', () => {
  it('should move the price against the trader', () => {
    fc.assert(
      fc.property(priceArb, fc.double({ min: 0, max: 0.5, noNaN: true }), fc.integer({ min: 1, max: 100_000 }), (close, slippage, quantity) => {
        const model = new BarExecutionModel({
          tradePrice: 'close',
          slippage,
          commission: { rate: 0, minimum: 0 },
        });

        const buy = model.quote('buy', quantity, bar(close));
        const sell = model.quote('sell', quantity, bar(close));

        expect(buy?.price).toBeGreaterThanOrEqual(close);
        expect(sell?.price).toBeLessThanOrEqual(close);
      })
    );
  });

  it('should charge max(minimum, notional x rate)', () => {
    fc.assert(
      fc.property(
        priceArb,
        sideArb,
        fc.integer({ min: 1, max: 100_000 }),
        fc.double({ min: 0, max: 0.01, noNaN: true }),
        fc.double({ min: 0, max: 100, noNaN: true }),
        (close, side, quantity, rate, minimum) => {
          const model = new BarExecutionModel({ tradePrice: 'close', slippage: 0.001, commission: { rate, minimum } });

          const quoted = model.quote(side, quantity, bar(close));

          expect(quoted).toBeDefined();
          expect(quoted?.commission).toBe(Math.max(minimum, (quoted?.price ?? 0) * quantity * rate));
          expect(quoted?.commission).toBeGreaterThanOrEqual(minimum);
        }
      )
    );
  });

  it('should fill at the quoted price and commission', () => {
    fc.assert(
      fc.property(priceArb, sideArb, fc.integer({ min: 1, max: 100_000 }), (close, side, quantity) => {
        const model = new BarExecutionModel({
          tradePrice: 'close',
          slippage: 0.001,
          commission: { rate: 0.0015, minimum: 1 },
        });

        const quoted = model.quote(side, quantity, bar(close));
        const fills = model.execute({ orderId: 'bt-o1', symbol: 'AAA', side, quantity, timestamp: 0 }, bar(close));

        expect(fills).toHaveLength(1);
        expect(fills[0]).toMatchObject({
          fillId: 'bt-o1-f1',
          quantity,
          price: quoted?.price,
          commission: quoted?.commission,
        });
      })
    );
  });
});
