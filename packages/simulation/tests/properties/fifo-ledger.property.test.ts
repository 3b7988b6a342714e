/**
 * Property Tests for FIFO Lot Matching
 * ====================================
 *
 * Critical Invariants:
 * 1. Quantity conservation: matched + open = everything filled, per side
 * 2. Net open quantity equals signed sum of fills
 * 3. Without commission, realized pnl equals the cash-flow pnl of closed quantity
 * 4. Each lot closes in fill order (entry timestamps never decrease across trades)
 * 5. One CompletedTrade per lot-closing event, whatever the fill sizes
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { Fill } from '@backtest-lab/core';
import { FifoLedger } from '../../src/ledger/index.js';

const fillArb = fc.record({
  side: fc.constantFrom<'buy' | 'sell'>('buy', 'sell'),
  quantity: fc.integer({ min: 1, max: 50 }),
  price: fc.integer({ min: 1, max: 500 }),
});

type Draft = { side: 'buy' | 'sell'; quantity: number; price: number };

/**
 * Matched quantity of every lot closure, in order, from a plain FIFO queue
 */
function referenceClosures(drafts: readonly Draft[]): number[] {
  const queue: Array<{ side: 'long' | 'short'; quantity: number }> = [];
  const closures: number[] = [];

  for (const draft of drafts) {
    const opening = draft.side === 'buy' ? 'long' : 'short';
    let remaining = draft.quantity;
    while (remaining > 0 && queue.length > 0 && queue[0].side !== opening) {
      const matched = Math.min(remaining, queue[0].quantity);
      closures.push(matched);
      queue[0].quantity -= matched;
      remaining -= matched;
      if (queue[0].quantity === 0) queue.shift();
    }
    if (remaining > 0) queue.push({ side: opening, quantity: remaining });
  }
  return closures;
}

function toFills(drafts: readonly Draft[]): Fill[] {
  return drafts.map((draft, i) => ({
    fillId: `f${i}`,
    orderId: `o${i}`,
    symbol: 'AAA',
    side: draft.side,
    quantity: draft.quantity,
    price: draft.price,
    commission: 0,
    timestamp: i * 60_000,
  }));
}

describe('FIFO Ledger - Property Tests', () => {
  it('net open quantity equals signed fill quantity', () => {
    fc.assert(
      fc.property(fc.array(fillArb, { minLength: 1, maxLength: 40 }), (drafts) => {
        const ledger = new FifoLedger({ allowShort: true });
        const fills = toFills(drafts);
        fills.forEach((f) => ledger.applyFill(f));

        const signed = fills.reduce((sum, f) => sum + (f.side === 'buy' ? f.quantity : -f.quantity), 0);
        return ledger.getNetQuantity('AAA') === signed;
      }),
      { numRuns: 200 }
    );
  });

  it('closed quantity plus open quantity accounts for every filled unit', () => {
    fc.assert(
      fc.property(fc.array(fillArb, { minLength: 1, maxLength: 40 }), (drafts) => {
        const ledger = new FifoLedger({ allowShort: true });
        const fills = toFills(drafts);
        fills.forEach((f) => ledger.applyFill(f));

        const filled = fills.reduce((sum, f) => sum + f.quantity, 0);
        const closed = ledger.getCompletedTrades().reduce((sum, t) => sum + t.quantity, 0);
        const open = ledger.getOpenLots('AAA').reduce((sum, l) => sum + l.quantity, 0);
        // every closed unit consumed one unit from each side
        return filled === 2 * closed + open;
      }),
      { numRuns: 200 }
    );
  });

  it('realized pnl without commission matches price differences of matched units', () => {
    fc.assert(
      fc.property(fc.array(fillArb, { minLength: 1, maxLength: 40 }), (drafts) => {
        const ledger = new FifoLedger({ allowShort: true });
        toFills(drafts).forEach((f) => ledger.applyFill(f));

        for (const trade of ledger.getCompletedTrades()) {
          const direction = trade.side === 'long' ? 1 : -1;
          expect(trade.pnl).toBeCloseTo((trade.exitPrice - trade.entryPrice) * trade.quantity * direction, 6);
        }
      }),
      { numRuns: 100 }
    );
  });

  it('closes lots in the order they were opened', () => {
    fc.assert(
      fc.property(fc.array(fillArb, { minLength: 1, maxLength: 40 }), (drafts) => {
        const ledger = new FifoLedger({ allowShort: true });
        toFills(drafts).forEach((f) => ledger.applyFill(f));

        for (const side of ['long', 'short'] as const) {
          const entries = ledger
            .getCompletedTrades()
            .filter((t) => t.side === side)
            .map((t) => t.entryTimestamp);
          for (let i = 1; i < entries.length; i++) {
            if (entries[i] < entries[i - 1]) return false;
          }
        }
        return true;
      }),
      { numRuns: 200 }
    );
  });

  it('emits one completed trade per lot closure for varied fill sizes', () => {
    const sizedFillArb = fc.record({
      side: fc.constantFrom<'buy' | 'sell'>('buy', 'sell'),
      quantity: fc.oneof(fc.integer({ min: 1, max: 5 }), fc.integer({ min: 20, max: 400 })),
      price: fc.integer({ min: 1, max: 500 }),
    });

    fc.assert(
      fc.property(fc.array(sizedFillArb, { minLength: 1, maxLength: 60 }), fc.boolean(), (drafts, allowShort) => {
        const ledger = new FifoLedger({ allowShort });
        toFills(drafts).forEach((f) => ledger.applyFill(f));

        const expected = referenceClosures(drafts);
        const trades = ledger.getCompletedTrades();
        expect(trades).toHaveLength(expected.length);
        expect(trades.map((t) => t.quantity)).toEqual(expected);
      }),
      { numRuns: 200 }
    );
  });
});
