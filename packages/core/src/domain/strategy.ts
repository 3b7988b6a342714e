/**
 * Strategy capability model
 *
 * A strategy is an opaque policy. Every strategy can make a per-bar decision;
 * portfolio strategies additionally select a universe and a target allocation.
 * The `hasUniverseSelection` tag is the only thing the engine looks at to pick
 * its operating mode. Strategies written before portfolio mode existed simply
 * leave it out and keep running single-instrument.
 */

import type { Candle, MarketSnapshot } from './market.js';
import type { AccountSnapshot, Fill, OrderSignal, Position } from './trading.js';

export type StrategyParams = Readonly<Record<string, unknown>>;

/**
 * Target weight per instrument, in strategy-reported order.
 * Weights are fractions of total equity and should sum to at most 1.
 */
export type TargetWeights = ReadonlyMap<string, number>;

interface StrategyBase {
  readonly name: string;
  readonly params: StrategyParams;
  /**
   * Called after each fill for an instrument the strategy trades
   */
  onFill?(fill: Fill, position: Position | undefined): void;
}

export interface BarStrategy extends StrategyBase {
  readonly hasUniverseSelection?: false;
  /**
   * @param bars - history up to and including the current bar, oldest first
   */
  onBar(
    bars: readonly Candle[],
    positions: readonly Position[],
    account: AccountSnapshot
  ): OrderSignal[];
}

export interface PortfolioStrategy extends StrategyBase {
  readonly hasUniverseSelection: true;
  /**
   * Instruments the strategy is willing to hold on `date`.
   * An empty list means "hold cash".
   */
  selectUniverse(date: number, snapshot: MarketSnapshot): string[] | Promise<string[]>;
  getTargetWeights(
    universe: readonly string[],
    snapshot: MarketSnapshot,
    account: AccountSnapshot
  ): TargetWeights | Promise<TargetWeights>;
}

export type Strategy = BarStrategy | PortfolioStrategy;

export type BacktestMode = 'single' | 'portfolio';

export function hasUniverseSelection(strategy: Strategy): strategy is PortfolioStrategy {
  return strategy.hasUniverseSelection === true;
}

export function resolveBacktestMode(strategy: Strategy): BacktestMode {
  return hasUniverseSelection(strategy) ? 'portfolio' : 'single';
}
