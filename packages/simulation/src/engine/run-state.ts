/**
 * Per-run mutable state
 * =====================
 * One instance per engine run: account, ledger, equity samples, order
 * numbering and diagnostics. Never shared between runs.
 */

import { BacktestCancelledError, type Logger } from '@backtest-lab/utils';
import type {
  Candle,
  EquitySample,
  Fill,
  OrderRequest,
  OrderSide,
  Strategy,
} from '@backtest-lab/core';
import type { BacktestConfig } from '../config.js';
import type { ExecutionModel } from '../execution/index.js';
import { FifoLedger } from '../ledger/index.js';
import { PortfolioTracker, planOrders, type QuoteFn } from '../position/index.js';
import { DiagnosticsCollector } from './diagnostics.js';

export class RunState {
  readonly tracker: PortfolioTracker;
  readonly ledger: FifoLedger;
  readonly diagnostics: DiagnosticsCollector;
  private readonly samples: EquitySample[] = [];
  private orderSeq = 0;

  constructor(
    readonly backtestId: string,
    readonly config: BacktestConfig,
    private readonly strategy: Strategy,
    private readonly executionModel: ExecutionModel,
    logger: Logger
  ) {
    this.tracker = new PortfolioTracker({
      initialCash: config.initialCapital,
      minRebalanceCost: config.minRebalanceCost,
    });
    this.ledger = new FifoLedger({ allowShort: config.allowShort });
    this.diagnostics = new DiagnosticsCollector(logger);
  }

  /**
   * Plan, execute and settle signed share deltas against the session's bars
   */
  trade(deltas: Iterable<readonly [string, number]>, bars: ReadonlyMap<string, Candle>, timestamp: number): Fill[] {
    const quote: QuoteFn = (symbol, side, quantity) => {
      const bar = bars.get(symbol);
      return bar ? this.executionModel.quote(side, quantity, bar) : undefined;
    };

    const plan = planOrders(deltas, quote, {
      timestamp,
      cash: this.tracker.getCash(),
      holdings: this.holdings(),
      maxPositions: this.config.maxPositions,
    });
    this.diagnostics.reject(plan.rejections);

    const fills: Fill[] = [];
    for (const order of plan.orders) {
      const bar = bars.get(order.symbol);
      if (bar) {
        fills.push(...this.execute(order.symbol, order.side, order.quantity, bar, timestamp));
      }
    }
    return fills;
  }

  /**
   * Liquidate every holding when cash has fallen below the configured minimum
   */
  enforceMinCash(bars: ReadonlyMap<string, Candle>, timestamp: number): void {
    const held = this.tracker.heldSymbols();
    if (this.tracker.getCash() >= this.config.minCash || held.length === 0) {
      return;
    }

    this.diagnostics.warn({
      timestamp,
      code: 'forced-liquidation',
      message: `Cash ${this.tracker.getCash()} below minimum ${this.config.minCash}; liquidating all positions`,
    });

    for (const symbol of held) {
      const bar = bars.get(symbol);
      if (!bar) {
        this.diagnostics.warn({
          timestamp,
          code: 'missing-price',
          symbol,
          message: `No price for ${symbol}; position kept through forced liquidation`,
        });
        continue;
      }
      const quantity = this.tracker.getQuantity(symbol);
      this.execute(symbol, quantity > 0 ? 'sell' : 'buy', Math.abs(quantity), bar, timestamp);
    }
  }

  /**
   * Revalue the account and append the session's equity sample
   */
  mark(prices: ReadonlyMap<string, number>, timestamp: number): void {
    this.tracker.markToMarket(prices);
    this.samples.push({ timestamp, equity: this.tracker.getEquity() });
  }

  /**
   * Cooperative cancellation point between sessions
   */
  checkpoint(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new BacktestCancelledError(this.diagnostics.processed, { backtestId: this.backtestId });
    }
  }

  getSamples(): EquitySample[] {
    return this.samples.slice();
  }

  private execute(symbol: string, side: OrderSide, quantity: number, bar: Candle, timestamp: number): Fill[] {
    const order: OrderRequest = {
      orderId: `${this.backtestId}-o${++this.orderSeq}`,
      symbol,
      side,
      quantity,
      timestamp,
    };
    const fills = this.executionModel.execute(order, bar);
    for (const fill of fills) {
      this.ledger.applyFill(fill);
      this.tracker.applyFill(fill);
      this.strategy.onFill?.(fill, this.tracker.getPosition(fill.symbol));
    }
    return fills;
  }

  private holdings(): Map<string, number> {
    const holdings = new Map<string, number>();
    for (const symbol of this.tracker.heldSymbols()) {
      holdings.set(symbol, this.tracker.getQuantity(symbol));
    }
    return holdings;
  }
}
