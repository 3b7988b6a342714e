/**
 * Portfolio Tracker
 * =================
 * Cash, per-instrument positions and last known prices for one run.
 *
 * The tracker is owned by exactly one engine run; nothing here is shared
 * between runs.
 */

import type { AccountSnapshot, Fill, Position, TargetWeights } from '@backtest-lab/core';

/** Quantities below this are treated as flat */
const QUANTITY_EPSILON = 1e-9;

interface Holding {
  /** Signed: negative when short */
  quantity: number;
  averageCost: number;
  realizedPnl: number;
}

export interface PortfolioTrackerOptions {
  initialCash: number;
  /** Rebalance orders with |delta| x price below this notional are dropped */
  minRebalanceCost?: number;
}

/**
 * Output of a rebalance computation
 */
export interface RebalanceProposal {
  /** Signed share deltas: target order first, then held-only instruments */
  deltas: Map<string, number>;
  /** Instruments the proposal could not size because no price was supplied */
  missingPrices: string[];
}

export class PortfolioTracker {
  private cash: number;
  private readonly minRebalanceCost: number;
  private readonly holdings = new Map<string, Holding>();
  private readonly lastPrices = new Map<string, number>();

  constructor(options: PortfolioTrackerOptions) {
    this.cash = options.initialCash;
    this.minRebalanceCost = options.minRebalanceCost ?? 0;
  }

  /**
   * Settle a fill: move cash, update signed quantity, average cost and
   * realized pnl. Commission is deducted from cash at fill time.
   */
  applyFill(fill: Fill): void {
    const notional = fill.quantity * fill.price;
    if (fill.side === 'buy') {
      this.cash -= notional + fill.commission;
    } else {
      this.cash += notional - fill.commission;
    }

    const holding = this.getHolding(fill.symbol);
    const signedQty = fill.side === 'buy' ? fill.quantity : -fill.quantity;

    if (holding.quantity === 0 || Math.sign(holding.quantity) === Math.sign(signedQty)) {
      const held = Math.abs(holding.quantity);
      holding.averageCost = (held * holding.averageCost + fill.quantity * fill.price) / (held + fill.quantity);
      holding.quantity += signedQty;
    } else {
      const direction = Math.sign(holding.quantity);
      const closing = Math.min(Math.abs(holding.quantity), fill.quantity);
      holding.realizedPnl += (fill.price - holding.averageCost) * closing * direction;
      holding.quantity += signedQty;

      const opened = fill.quantity - closing;
      if (opened > QUANTITY_EPSILON) {
        // position flipped through zero
        holding.averageCost = fill.price;
      } else if (Math.abs(holding.quantity) <= QUANTITY_EPSILON) {
        holding.quantity = 0;
        holding.averageCost = 0;
      }
    }

    if (!this.lastPrices.has(fill.symbol)) {
      this.lastPrices.set(fill.symbol, fill.price);
    }
  }

  /**
   * Update last known prices; instruments absent from `prices` keep theirs
   */
  markToMarket(prices: ReadonlyMap<string, number>): void {
    for (const [symbol, price] of prices) {
      if (Number.isFinite(price) && price > 0) {
        this.lastPrices.set(symbol, price);
      }
    }
  }

  getCash(): number {
    return this.cash;
  }

  getLastPrice(symbol: string): number | undefined {
    return this.lastPrices.get(symbol);
  }

  /**
   * cash + sum(quantity x last known price)
   */
  getEquity(): number {
    let equity = this.cash;
    for (const [symbol, holding] of this.holdings) {
      if (holding.quantity !== 0) {
        equity += holding.quantity * (this.lastPrices.get(symbol) ?? holding.averageCost);
      }
    }
    return equity;
  }

  getQuantity(symbol: string): number {
    return this.holdings.get(symbol)?.quantity ?? 0;
  }

  /**
   * Instruments with a non-zero quantity, in first-traded order
   */
  heldSymbols(): string[] {
    const symbols: string[] = [];
    for (const [symbol, holding] of this.holdings) {
      if (holding.quantity !== 0) {
        symbols.push(symbol);
      }
    }
    return symbols;
  }

  getPosition(symbol: string): Position | undefined {
    const holding = this.holdings.get(symbol);
    return holding ? this.toPosition(symbol, holding) : undefined;
  }

  /**
   * Open positions only
   */
  getPositions(): Position[] {
    return this.heldSymbols().map((symbol) => this.toPosition(symbol, this.getHolding(symbol)));
  }

  snapshot(): AccountSnapshot {
    return {
      cash: this.cash,
      equity: this.getEquity(),
      positions: this.getPositions(),
    };
  }

  /**
   * Current weight per held instrument: quantity x last price / equity
   */
  computeWeights(): Map<string, number> {
    const equity = this.getEquity();
    const weights = new Map<string, number>();
    for (const symbol of this.heldSymbols()) {
      const price = this.lastPrices.get(symbol) ?? 0;
      weights.set(symbol, equity > 0 ? (this.getQuantity(symbol) * price) / equity : 0);
    }
    return weights;
  }

  /**
   * Signed share deltas moving current holdings toward `targetWeights`.
   *
   * target shares = floor(weight x totalEquity / price); held instruments
   * missing from the target set go to zero.
   */
  computeRebalanceOrders(
    targetWeights: TargetWeights,
    currentPrices: ReadonlyMap<string, number>,
    totalEquity: number
  ): RebalanceProposal {
    const deltas = new Map<string, number>();
    const missingPrices: string[] = [];

    const universe = [...targetWeights.keys()];
    for (const symbol of this.heldSymbols()) {
      if (!targetWeights.has(symbol)) {
        universe.push(symbol);
      }
    }

    for (const symbol of universe) {
      const price = currentPrices.get(symbol);
      if (price === undefined || !Number.isFinite(price) || price <= 0) {
        missingPrices.push(symbol);
        continue;
      }

      const weight = Math.max(0, targetWeights.get(symbol) ?? 0);
      const targetShares = Number.isFinite(weight) && totalEquity > 0
        ? Math.floor((weight * totalEquity) / price)
        : 0;
      const delta = targetShares - this.getQuantity(symbol);

      if (delta === 0 || Math.abs(delta) * price < this.minRebalanceCost) {
        continue;
      }
      deltas.set(symbol, delta);
    }

    return { deltas, missingPrices };
  }

  private toPosition(symbol: string, holding: Holding): Position {
    const lastPrice = this.lastPrices.get(symbol) ?? holding.averageCost;
    return {
      symbol,
      quantity: holding.quantity,
      averageCost: holding.averageCost,
      realizedPnl: holding.realizedPnl,
      unrealizedPnl: (lastPrice - holding.averageCost) * holding.quantity,
      lastPrice,
    };
  }

  private getHolding(symbol: string): Holding {
    let holding = this.holdings.get(symbol);
    if (!holding) {
      holding = { quantity: 0, averageCost: 0, realizedPnl: 0 };
      this.holdings.set(symbol, holding);
    }
    return holding;
  }
}
