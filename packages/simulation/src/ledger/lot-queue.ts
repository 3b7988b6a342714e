/**
 * Lot Queue
 * =========
 * FIFO queue of open lots for one instrument and one direction.
 *
 * Array-backed with a moving head index: push and shift are O(1) amortized.
 * The backing array is compacted once the consumed prefix dominates it.
 */

import type { Lot } from '@backtest-lab/core';

const COMPACT_THRESHOLD = 32;

export class LotQueue {
  private items: Lot[] = [];
  private head = 0;

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  push(lot: Lot): void {
    this.items.push(lot);
  }

  /**
   * Oldest open lot, or undefined when empty
   */
  peek(): Lot | undefined {
    return this.head < this.items.length ? this.items[this.head] : undefined;
  }

  shift(): Lot | undefined {
    const lot = this.peek();
    if (lot === undefined) {
      return undefined;
    }
    this.head++;
    this.compact();
    return lot;
  }

  /**
   * Total open quantity across lots
   */
  totalQuantity(): number {
    let total = 0;
    for (let i = this.head; i < this.items.length; i++) {
      total += this.items[i].quantity;
    }
    return total;
  }

  /**
   * Copies of the open lots, oldest first
   */
  toArray(): Lot[] {
    return this.items.slice(this.head).map((lot) => ({ ...lot }));
  }

  private compact(): void {
    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
