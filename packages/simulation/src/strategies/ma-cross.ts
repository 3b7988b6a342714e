/**
 * Moving Average Cross Strategy
 *
 * Single-instrument. Buys `positionSize` of equity on a golden cross when
 * flat, sells the whole long position on a dead cross.
 */

import { z } from 'zod';
import type {
  AccountSnapshot,
  BarStrategy,
  Candle,
  OrderSignal,
  Position,
} from '@backtest-lab/core';
import { detectCross } from '../indicators/moving-averages.js';
import { parseStrategyParams } from './shared.js';
import { logger } from '../logger.js';

export const MovingAverageCrossParamsSchema = z
  .object({
    shortPeriod: z.number().int().min(2).max(50).default(5),
    longPeriod: z.number().int().min(3).max(200).default(20),
    positionSize: z.number().min(0.01).max(1).default(0.1),
  })
  .refine((p) => p.shortPeriod < p.longPeriod, {
    message: 'shortPeriod must be less than longPeriod',
    path: ['shortPeriod'],
  });

export type MovingAverageCrossParams = z.infer<typeof MovingAverageCrossParamsSchema>;

export class MovingAverageCrossStrategy implements BarStrategy {
  readonly name = 'MovingAverageCross';
  readonly params: MovingAverageCrossParams;

  constructor(params: z.input<typeof MovingAverageCrossParamsSchema> = {}) {
    this.params = parseStrategyParams(MovingAverageCrossParamsSchema, params, this.name);
  }

  onBar(bars: readonly Candle[], positions: readonly Position[], account: AccountSnapshot): OrderSignal[] {
    const index = bars.length - 1;
    const bar = bars[index];
    if (!bar) {
      return [];
    }

    const cross = detectCross(bars, this.params.shortPeriod, this.params.longPeriod, index);
    const position = positions.find((p) => p.symbol === bar.symbol);

    if (cross === 'golden' && !position) {
      const quantity = Math.floor((account.equity * this.params.positionSize) / bar.close);
      if (quantity > 0) {
        logger.debug('Golden cross buy signal', { symbol: bar.symbol, quantity, timestamp: bar.timestamp });
        return [{ symbol: bar.symbol, side: 'buy', quantity }];
      }
    }

    if (cross === 'dead' && position && position.quantity > 0) {
      logger.debug('Dead cross sell signal', { symbol: bar.symbol, quantity: position.quantity, timestamp: bar.timestamp });
      return [{ symbol: bar.symbol, side: 'sell', quantity: position.quantity }];
    }

    return [];
  }
}
