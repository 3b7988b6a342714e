/**
 * Ledger Module
 * =============
 * FIFO lot matching and completed-trade extraction.
 */

export { FifoLedger, type FifoLedgerOptions } from './fifo-ledger.js';
export { LotQueue } from './lot-queue.js';
