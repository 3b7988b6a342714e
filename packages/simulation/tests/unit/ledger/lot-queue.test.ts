import { describe, it, expect } from 'vitest';
import type { Lot } from '@backtest-lab/core';
import { LotQueue } from '../../../src/ledger/lot-queue.js';

function lot(quantity: number, fillId: string): Lot {
  return {
    symbol: 'AAA',
    side: 'long',
    quantity,
    entryPrice: 10,
    entryTimestamp: 0,
    entryCommission: 0,
    fillId,
  };
}

describe('LotQueue', () => {
  it('is FIFO', () => {
    const queue = new LotQueue();
    queue.push(lot(1, 'a'));
    queue.push(lot(2, 'b'));

    expect(queue.peek()?.fillId).toBe('a');
    expect(queue.shift()?.fillId).toBe('a');
    expect(queue.shift()?.fillId).toBe('b');
    expect(queue.shift()).toBeUndefined();
    expect(queue.isEmpty()).toBe(true);
  });

  it('keeps order and totals across compaction', () => {
    const queue = new LotQueue();
    for (let i = 0; i < 100; i++) {
      queue.push(lot(1, `l${i}`));
    }
    for (let i = 0; i < 70; i++) {
      queue.shift();
    }

    expect(queue.size).toBe(30);
    expect(queue.totalQuantity()).toBe(30);
    expect(queue.peek()?.fillId).toBe('l70');
    expect(queue.toArray().map((l) => l.fillId).slice(0, 2)).toEqual(['l70', 'l71']);
  });
});
