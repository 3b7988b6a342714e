/**
 * Execution Model Interface
 *
 * Turns an order into fills against the session's bar. The engine quotes an
 * order first (for cash and limit checks) and executes it afterwards; both
 * must agree on price and commission for a whole fill.
 */

import type { Candle, Fill, OrderRequest, OrderSide, TradePricePolicy } from '@backtest-lab/core';
import type { CommissionConfig } from '../config.js';
import {
  applySlippage,
  createCommissionModel,
  referencePrice,
  type CommissionModel,
} from './fees.js';

/**
 * Expected price and commission for an order of a given size
 */
export interface ExecutionQuote {
  price: number;
  commission: number;
}

export interface ExecutionModel {
  readonly name: string;

  /**
   * Quote an order without executing it.
   * Returns undefined when the bar carries no usable price.
   */
  quote(side: OrderSide, quantity: number, bar: Candle): ExecutionQuote | undefined;

  /**
   * Execute an order against the bar. Zero fills means nothing traded.
   */
  execute(order: OrderRequest, bar: Candle): Fill[];
}

export interface BarExecutionModelConfig {
  tradePrice: TradePricePolicy;
  slippage: number;
  commission: CommissionConfig;
}

/**
 * Fills every order in full at the bar's reference price plus slippage
 */
export class BarExecutionModel implements ExecutionModel {
  readonly name = 'bar';
  private readonly commissionModel: CommissionModel;

  constructor(private readonly config: BarExecutionModelConfig) {
    this.commissionModel = createCommissionModel(config.commission);
  }

  quote(side: OrderSide, quantity: number, bar: Candle): ExecutionQuote | undefined {
    const price = applySlippage(referencePrice(bar, this.config.tradePrice), side, this.config.slippage);
    if (price <= 0 || !(quantity > 0)) {
      return undefined;
    }
    return { price, commission: this.commissionModel.calculate(price * quantity) };
  }

  execute(order: OrderRequest, bar: Candle): Fill[] {
    const quoted = this.quote(order.side, order.quantity, bar);
    if (!quoted) {
      return [];
    }
    return [
      {
        fillId: `${order.orderId}-f1`,
        orderId: order.orderId,
        symbol: order.symbol,
        side: order.side,
        quantity: order.quantity,
        price: quoted.price,
        commission: quoted.commission,
        timestamp: order.timestamp,
      },
    ];
  }
}

export function createExecutionModel(config: BarExecutionModelConfig): ExecutionModel {
  return new BarExecutionModel(config);
}
