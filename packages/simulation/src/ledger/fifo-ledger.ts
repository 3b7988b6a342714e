/**
 * FIFO Ledger
 * ===========
 * Consumes fills and produces completed round trips per instrument.
 *
 * Each instrument keeps two independent lot queues: long lots (opened by buys)
 * and short lots (opened by sells). An incoming fill closes the opposite
 * queue oldest-first, quantity-greedy, one CompletedTrade per lot closure.
 * Whatever the opposite queue cannot absorb opens a new lot on the fill's side.
 */

import { MatchingError } from '@backtest-lab/utils';
import type {
  CompletedTrade,
  Fill,
  Lot,
  LotSide,
  MatchingViolation,
} from '@backtest-lab/core';
import { LotQueue } from './lot-queue.js';
import { holdingPeriodDays } from '../time/index.js';
import { logger } from '../logger.js';

/** Quantities below this are treated as fully consumed */
const QUANTITY_EPSILON = 1e-9;

export interface FifoLedgerOptions {
  /**
   * When false, a sell without long exposure is recorded as a matching
   * violation. It still opens a short lot so the ledger stays complete.
   */
  allowShort?: boolean;
}

interface InstrumentBook {
  long: LotQueue;
  short: LotQueue;
  lastTimestamp: number;
}

export class FifoLedger {
  private readonly books = new Map<string, InstrumentBook>();
  private readonly fills: Fill[] = [];
  private readonly trades: CompletedTrade[] = [];
  private readonly violations: MatchingViolation[] = [];
  private readonly allowShort: boolean;
  private frozen = false;

  constructor(options: FifoLedgerOptions = {}) {
    this.allowShort = options.allowShort ?? false;
  }

  /**
   * Apply one fill and return the trades it closed (possibly none)
   */
  applyFill(fill: Fill): CompletedTrade[] {
    if (this.frozen) {
      throw new MatchingError('Ledger is frozen; no further fills accepted', { fillId: fill.fillId });
    }
    const book = this.getBook(fill.symbol);
    this.validateFill(fill, book);

    const closing = fill.side === 'buy' ? book.short : book.long;
    const opening = fill.side === 'buy' ? book.long : book.short;
    const openingSide: LotSide = fill.side === 'buy' ? 'long' : 'short';

    const closed: CompletedTrade[] = [];
    let remaining = fill.quantity;

    while (remaining > QUANTITY_EPSILON) {
      const lot = closing.peek();
      if (lot === undefined) {
        break;
      }

      const matched = Math.min(remaining, lot.quantity);
      closed.push(this.closeAgainst(lot, fill, matched));

      lot.entryCommission -= lot.entryCommission * (matched / lot.quantity);
      lot.quantity -= matched;
      remaining -= matched;

      if (lot.quantity <= QUANTITY_EPSILON) {
        closing.shift();
      }
    }

    if (remaining > QUANTITY_EPSILON) {
      if (openingSide === 'short' && !this.allowShort) {
        this.recordViolation(fill, remaining);
      }
      opening.push({
        symbol: fill.symbol,
        side: openingSide,
        quantity: remaining,
        entryPrice: fill.price,
        entryTimestamp: fill.timestamp,
        entryCommission: fill.commission * (remaining / fill.quantity),
        fillId: fill.fillId,
      });
    }

    book.lastTimestamp = fill.timestamp;
    this.fills.push({ ...fill });
    this.trades.push(...closed);
    return closed;
  }

  /**
   * Open lots for an instrument, oldest first
   */
  getOpenLots(symbol: string): Lot[] {
    const book = this.books.get(symbol);
    if (!book) {
      return [];
    }
    return [...book.long.toArray(), ...book.short.toArray()];
  }

  /**
   * Signed open quantity: positive long, negative short
   */
  getNetQuantity(symbol: string): number {
    const book = this.books.get(symbol);
    if (!book) {
      return 0;
    }
    return book.long.totalQuantity() - book.short.totalQuantity();
  }

  getCompletedTrades(symbol?: string): CompletedTrade[] {
    return symbol === undefined
      ? this.trades.slice()
      : this.trades.filter((trade) => trade.symbol === symbol);
  }

  getFills(symbol?: string): Fill[] {
    return symbol === undefined
      ? this.fills.slice()
      : this.fills.filter((fill) => fill.symbol === symbol);
  }

  getViolations(): MatchingViolation[] {
    return this.violations.slice();
  }

  /**
   * Instruments that have seen at least one fill, in first-seen order
   */
  symbols(): string[] {
    return Array.from(this.books.keys());
  }

  /**
   * Stop accepting fills; the run is complete
   */
  freeze(): void {
    this.frozen = true;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  private closeAgainst(lot: Lot, fill: Fill, matched: number): CompletedTrade {
    const direction = lot.side === 'long' ? 1 : -1;
    const entryCommission = lot.entryCommission * (matched / lot.quantity);
    const exitCommission = fill.commission * (matched / fill.quantity);
    const commission = entryCommission + exitCommission;
    const pnl = (fill.price - lot.entryPrice) * matched * direction - commission;
    const entryValue = lot.entryPrice * matched;

    return {
      symbol: fill.symbol,
      side: lot.side,
      entryTimestamp: lot.entryTimestamp,
      exitTimestamp: fill.timestamp,
      entryPrice: lot.entryPrice,
      exitPrice: fill.price,
      quantity: matched,
      pnl,
      returnPct: entryValue > 0 ? (pnl / entryValue) * 100 : 0,
      holdingPeriodDays: holdingPeriodDays(lot.entryTimestamp, fill.timestamp),
      commission,
      entryFillId: lot.fillId,
      exitFillId: fill.fillId,
    };
  }

  private recordViolation(fill: Fill, quantity: number): void {
    this.violations.push({
      timestamp: fill.timestamp,
      symbol: fill.symbol,
      fillId: fill.fillId,
      quantity,
    });
    logger.warn('Sell without long exposure opened a short lot', {
      symbol: fill.symbol,
      fillId: fill.fillId,
      quantity,
    });
  }

  private validateFill(fill: Fill, book: InstrumentBook): void {
    if (!(fill.quantity > 0) || !Number.isFinite(fill.quantity)) {
      throw new MatchingError('Fill quantity must be positive', { fillId: fill.fillId, quantity: fill.quantity });
    }
    if (!(fill.price > 0) || !Number.isFinite(fill.price)) {
      throw new MatchingError('Fill price must be positive', { fillId: fill.fillId, price: fill.price });
    }
    if (!(fill.commission >= 0) || !Number.isFinite(fill.commission)) {
      throw new MatchingError('Fill commission must be non-negative', {
        fillId: fill.fillId,
        commission: fill.commission,
      });
    }
    if (fill.timestamp < book.lastTimestamp) {
      throw new MatchingError('Fill is older than the previous fill for this instrument', {
        fillId: fill.fillId,
        symbol: fill.symbol,
        timestamp: fill.timestamp,
        previous: book.lastTimestamp,
      });
    }
  }

  private getBook(symbol: string): InstrumentBook {
    let book = this.books.get(symbol);
    if (!book) {
      book = { long: new LotQueue(), short: new LotQueue(), lastTimestamp: Number.NEGATIVE_INFINITY };
      this.books.set(symbol, book);
    }
    return book;
  }
}
