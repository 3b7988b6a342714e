/**
 * Per-instrument drill-down of a completed run.
 */

import { NotFoundError } from '@backtest-lab/utils';
import type { CompletedTrade, Fill, Lot, SymbolPerformance } from '@backtest-lab/core';
import type { BacktestRunOutput } from '../engine/index.js';

export interface SymbolDetail {
  symbol: string;
  /** Undefined when the instrument was traded but never closed a trade */
  performance: SymbolPerformance | undefined;
  /** Closing order */
  trades: CompletedTrade[];
  /** Execution order */
  fills: Fill[];
  openLots: Lot[];
}

export function buildSymbolDetail(output: BacktestRunOutput, symbol: string): SymbolDetail {
  const fills = output.fills.filter((f) => f.symbol === symbol);
  if (fills.length === 0) {
    throw new NotFoundError('Symbol', symbol, { backtestId: output.result.backtestId });
  }

  return {
    symbol,
    performance: output.result.symbolPerformances.find((p) => p.symbol === symbol),
    trades: output.trades.filter((t) => t.symbol === symbol),
    fills,
    openLots: output.openLots.filter((l) => l.symbol === symbol),
  };
}
