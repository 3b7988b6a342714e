/**
 * Commission and Slippage
 * =======================
 * Trading cost primitives for bar-level execution.
 */

import type { Candle, OrderSide, TradePricePolicy } from '@backtest-lab/core';
import type { CommissionConfig } from '../config.js';

/**
 * Commission charged on one fill
 */
export interface CommissionModel {
  calculate(notional: number): number;
}

/**
 * Default cost configuration: 0.15% with no floor
 */
export const DEFAULT_COMMISSION_CONFIG: CommissionConfig = {
  rate: 0.0015,
  minimum: 0,
};

/**
 * Proportional commission with a per-fill floor: max(minimum, notional x rate)
 */
export function createCommissionModel(config: CommissionConfig = DEFAULT_COMMISSION_CONFIG): CommissionModel {
  return {
    calculate(notional: number): number {
      // Handle invalid inputs
      if (notional <= 0 || !Number.isFinite(notional)) {
        return 0;
      }
      return Math.max(config.minimum, notional * config.rate);
    },
  };
}

/**
 * Reference price of a bar under the configured policy.
 * VWAP is approximated by the typical price (high + low + close) / 3.
 */
export function referencePrice(bar: Candle, policy: TradePricePolicy): number {
  switch (policy) {
    case 'open':
      return bar.open;
    case 'close':
      return bar.close;
    case 'vwap':
      return (bar.high + bar.low + bar.close) / 3;
  }
}

/**
 * Price actually paid (buy) or received (sell) after slippage
 */
export function applySlippage(price: number, side: OrderSide, slippage: number): number {
  // Handle invalid inputs
  if (price <= 0 || !Number.isFinite(price)) {
    return 0;
  }
  const result = side === 'buy' ? price * (1 + slippage) : price * (1 - slippage);

  // Ensure result is valid and non-negative
  if (!Number.isFinite(result) || result < 0) {
    return 0;
  }
  return result;
}
