/**
 * JSON dataset market data
 * ========================
 * Loads a dataset file into an in-memory market data source:
 *
 * ```json
 * {
 *   "snapshots": { "2024-01-02": [{ "symbol": "AAA", "price": 10, "volumeAmount": 5000 }] },
 *   "bars": { "AAA": [{ "timestamp": "2024-01-02", "open": 10, "high": 11, "low": 9, "close": 10, "volume": 500 }] }
 * }
 * ```
 *
 * Dates are ISO strings (UTC) or epoch milliseconds.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '@backtest-lab/utils';
import type { Candle, MarketSnapshot } from '@backtest-lab/core';
import { InMemoryMarketData, parseIsoDate, type InMemoryDataset } from '@backtest-lab/simulation';
import { logger } from '../logger.js';

const TimestampSchema = z.union([z.number().finite(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'number') {
    return value;
  }
  const parsed = parseIsoDate(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

const SnapshotRowSchema = z.object({
  symbol: z.string().min(1),
  price: z.number().finite(),
  volumeAmount: z.number().finite(),
  per: z.number().finite().optional(),
  pbr: z.number().finite().optional(),
  roe: z.number().finite().optional(),
  marketCap: z.number().finite().optional(),
});

const BarSchema = z.object({
  timestamp: TimestampSchema,
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().finite().default(0),
});

export const DatasetSchema = z.object({
  snapshots: z.record(z.string(), z.array(SnapshotRowSchema)).default({}),
  bars: z.record(z.string(), z.array(BarSchema)).default({}),
});

/**
 * Validate a parsed dataset document and key it the way the engine reads it
 */
export function parseDataset(input: unknown): InMemoryDataset {
  const parsed = DatasetSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`Invalid dataset at ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'unknown'}`, {
      issues: parsed.error.issues,
    });
  }

  const snapshots = new Map<number, MarketSnapshot>();
  for (const [date, rows] of Object.entries(parsed.data.snapshots)) {
    const timestamp = parseIsoDate(date);
    if (timestamp === null) {
      throw new ValidationError(`Invalid snapshot date: ${date}`, { date });
    }
    snapshots.set(timestamp, rows);
  }

  const bars = new Map<string, Candle[]>();
  for (const [symbol, series] of Object.entries(parsed.data.bars)) {
    bars.set(
      symbol,
      series.map((bar) => ({ symbol, ...bar }))
    );
  }

  return { snapshots, bars };
}

export class JsonFileMarketData extends InMemoryMarketData {
  constructor(
    dataset: InMemoryDataset,
    readonly path: string
  ) {
    super(dataset);
  }

  static async load(path: string): Promise<JsonFileMarketData> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      throw new NotFoundError('Dataset', path, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(`Dataset is not valid JSON: ${path}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const dataset = parseDataset(document);
    logger.debug('Dataset loaded', { path, snapshots: dataset.snapshots.size, instruments: dataset.bars.size });
    return new JsonFileMarketData(dataset, path);
  }
}
