/**
 * Backtest Engine
 * ===============
 * Replays historical sessions against a strategy and reduces the result.
 *
 * Mode is chosen by the strategy's capability tag:
 * - single-instrument: the caller supplies (or names) one instrument's bars
 *   and the strategy decides per bar
 * - portfolio: per session date, snapshot -> select -> allocate -> rebalance
 *   -> settle -> mark, with bars fetched for whatever the strategy selected
 *
 * Sessions run strictly in order. A session whose market data cannot be
 * loaded, or whose strategy call throws, is skipped without touching account
 * state; setup problems fail before the first session. A cancelled run never
 * yields a result.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  BacktestSetupError,
  DataUnavailableError,
  LogHelpers,
  toError,
  type Logger,
} from '@backtest-lab/utils';
import {
  createSystemClock,
  hasUniverseSelection,
  resolveBacktestMode,
  type BacktestResult,
  type BarStrategy,
  type Candle,
  type ClockPort,
  type CompletedTrade,
  type Fill,
  type Lot,
  type MarketDataSource,
  type MarketSnapshot,
  type OrderSignal,
  type PortfolioStrategy,
  type Strategy,
  type TargetWeights,
} from '@backtest-lab/core';
import { parseBacktestConfig, type BacktestConfig, type BacktestConfigInput } from '../config.js';
import { createExecutionModel, referencePrice, type ExecutionModel } from '../execution/index.js';
import { resolveSessions } from '../data/index.js';
import { reduceMetrics } from '../metrics/index.js';
import { toIsoDate } from '../time/index.js';
import { logger as packageLogger } from '../logger.js';
import { RunState } from './run-state.js';
import { sanitizeTargetWeights } from './weights.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface BacktestRequest {
  strategy?: Strategy;
  /** UTC epoch ms, inclusive */
  startDate: number;
  /** UTC epoch ms, inclusive */
  endDate: number;
  config?: BacktestConfigInput;
  /** Defaults to a random UUID */
  backtestId?: string;
  /** Single-instrument mode: the instrument's bars */
  bars?: readonly Candle[];
  /** Single-instrument mode: load this instrument from `dataSource` when `bars` is omitted */
  symbol?: string;
  /** Required in portfolio mode */
  dataSource?: MarketDataSource;
}

export interface BacktestRunOptions {
  signal?: AbortSignal;
}

export interface BacktestRunOutput {
  result: BacktestResult;
  /** Every fill in execution order */
  fills: Fill[];
  /** Every completed trade in closing order */
  trades: CompletedTrade[];
  /** Lots still open at the end of the run */
  openLots: Lot[];
}

export interface BacktestEngineDeps {
  executionModelFactory?: (config: BacktestConfig) => ExecutionModel;
  clock?: ClockPort;
  logger?: Logger;
}

export class BacktestEngine {
  private readonly executionModelFactory: (config: BacktestConfig) => ExecutionModel;
  private readonly clock: ClockPort;
  private readonly logger: Logger;

  constructor(deps: BacktestEngineDeps = {}) {
    this.executionModelFactory = deps.executionModelFactory ?? createExecutionModel;
    this.clock = deps.clock ?? createSystemClock();
    this.logger = deps.logger ?? packageLogger;
  }

  async run(request: BacktestRequest, options: BacktestRunOptions = {}): Promise<BacktestRunOutput> {
    const strategy = request.strategy;
    if (!strategy) {
      throw new BacktestSetupError('No strategy bound to the backtest');
    }
    validateDateRange(request.startDate, request.endDate);

    const config = parseBacktestConfig(request.config);
    const backtestId = request.backtestId ?? uuidv4();
    const mode = resolveBacktestMode(strategy);
    const runLogger = this.logger.child({ backtestId, strategy: strategy.name, mode });
    const startedAt = this.clock.nowMs();

    const run = new RunState(backtestId, config, strategy, this.executionModelFactory(config), runLogger);

    runLogger.info('Backtest started', {
      startDate: toIsoDate(request.startDate),
      endDate: toIsoDate(request.endDate),
      initialCapital: config.initialCapital,
    });

    if (hasUniverseSelection(strategy)) {
      const source = request.dataSource;
      if (!source) {
        throw new BacktestSetupError('Portfolio mode needs a market data source', { strategy: strategy.name });
      }
      const sessions = await this.loadSessions(source, request.startDate, request.endDate);
      run.checkpoint(options.signal);
      await this.runPortfolio(run, strategy, source, sessions, options.signal);
    } else {
      const bars = await this.loadBars(request, config);
      run.checkpoint(options.signal);
      this.runSingle(run, strategy, bars, options.signal);
    }

    run.ledger.freeze();
    const trades = run.ledger.getCompletedTrades();
    const metrics = reduceMetrics(trades, run.getSamples(), config.initialCapital, {
      periodsPerYear: config.periodsPerYear,
      riskFreeRate: config.riskFreeRate,
    });

    const result: BacktestResult = {
      backtestId,
      strategyName: strategy.name,
      mode,
      startDate: toIsoDate(request.startDate),
      endDate: toIsoDate(request.endDate),
      initialCapital: config.initialCapital,
      ...metrics,
      diagnostics: run.diagnostics.build(run.ledger.getViolations()),
    };

    LogHelpers.performance(runLogger, 'Backtest', this.clock.nowMs() - startedAt, {
      sessionsProcessed: result.diagnostics.sessionsProcessed,
      skippedSessions: result.diagnostics.skippedSessions,
      totalTrades: result.totalTrades,
      finalEquity: result.finalEquity,
    });

    return {
      result,
      fills: run.ledger.getFills(),
      trades,
      openLots: run.ledger.symbols().flatMap((symbol) => run.ledger.getOpenLots(symbol)),
    };
  }

  private runSingle(
    run: RunState,
    strategy: BarStrategy,
    bars: readonly Candle[],
    signal: AbortSignal | undefined
  ): void {
    const history: Candle[] = [];

    for (const bar of bars) {
      history.push(bar);
      const sessionBars = new Map([[bar.symbol, bar]]);
      run.tracker.markToMarket(new Map([[bar.symbol, bar.close]]));

      let signals: OrderSignal[];
      try {
        signals = strategy.onBar(history, run.tracker.getPositions(), run.tracker.snapshot());
      } catch (error) {
        run.diagnostics.sessionSkipped(bar.timestamp, 'Strategy signal', error);
        run.checkpoint(signal);
        continue;
      }
      run.trade(toDeltas(signals), sessionBars, bar.timestamp);
      run.enforceMinCash(sessionBars, bar.timestamp);
      run.mark(new Map([[bar.symbol, bar.close]]), bar.timestamp);

      const processed = run.diagnostics.sessionProcessed();
      this.logger.debug('Session processed', { backtestId: run.backtestId, timestamp: bar.timestamp, processed });
      run.checkpoint(signal);
    }
  }

  private async runPortfolio(
    run: RunState,
    strategy: PortfolioStrategy,
    source: MarketDataSource,
    sessions: readonly number[],
    signal: AbortSignal | undefined
  ): Promise<void> {
    const { config } = run;

    for (const date of sessions) {
      let snapshot: MarketSnapshot;
      try {
        snapshot = await source.getMarketSnapshot(date);
      } catch (error) {
        run.diagnostics.sessionSkipped(date, 'Market snapshot load', unavailable('snapshot', date, error));
        run.checkpoint(signal);
        continue;
      }

      // select + allocate
      let targets: Map<string, number> | undefined;
      if (run.diagnostics.processed % config.rebalanceEvery === 0) {
        let requested: TargetWeights;
        try {
          const universe = await strategy.selectUniverse(date, snapshot);
          requested = await strategy.getTargetWeights(universe, snapshot, run.tracker.snapshot());
        } catch (error) {
          run.diagnostics.sessionSkipped(date, 'Strategy allocation', error);
          run.checkpoint(signal);
          continue;
        }
        const sanitized = sanitizeTargetWeights(requested, date);
        sanitized.warnings.forEach((warning) => run.diagnostics.warn(warning));
        targets = sanitized.weights;
      }

      const symbols = Array.from(new Set([...(targets?.keys() ?? []), ...run.tracker.heldSymbols()]));
      let ohlc: Map<string, Candle[]>;
      try {
        ohlc = symbols.length > 0
          ? await source.getMultiOHLC(symbols, config.interval, date, date + MS_PER_DAY - 1)
          : new Map<string, Candle[]>();
      } catch (error) {
        run.diagnostics.sessionSkipped(date, 'OHLC load', unavailable('ohlc', date, error));
        run.checkpoint(signal);
        continue;
      }

      const bars = sessionBars(run, symbols, ohlc, snapshot, date);

      // rebalance + settle
      if (targets) {
        const tradePrices = new Map<string, number>();
        for (const [symbol, bar] of bars) {
          tradePrices.set(symbol, referencePrice(bar, config.tradePrice));
        }
        run.tracker.markToMarket(tradePrices);

        const proposal = run.tracker.computeRebalanceOrders(targets, tradePrices, run.tracker.getEquity());
        for (const symbol of proposal.missingPrices) {
          run.diagnostics.warn({
            timestamp: date,
            code: 'missing-price',
            symbol,
            message: `No price for ${symbol}; skipped for this session`,
          });
        }
        run.trade(proposal.deltas, bars, date);
      }
      run.enforceMinCash(bars, date);

      // mark
      const closes = new Map<string, number>();
      for (const [symbol, bar] of bars) {
        closes.set(symbol, bar.close);
      }
      run.mark(closes, date);

      const processed = run.diagnostics.sessionProcessed();
      this.logger.debug('Session processed', { backtestId: run.backtestId, date: toIsoDate(date), processed });
      run.checkpoint(signal);
    }
  }

  private async loadSessions(source: MarketDataSource, startDate: number, endDate: number): Promise<number[]> {
    try {
      return await resolveSessions(source, startDate, endDate);
    } catch (error) {
      throw new BacktestSetupError('Could not resolve the trading calendar', {
        startDate: toIsoDate(startDate),
        endDate: toIsoDate(endDate),
        cause: toError(error).message,
      });
    }
  }

  private async loadBars(request: BacktestRequest, config: BacktestConfig): Promise<Candle[]> {
    let bars = request.bars;

    if (!bars && request.symbol !== undefined && request.dataSource) {
      try {
        const loaded = await request.dataSource.getMultiOHLC(
          [request.symbol],
          config.interval,
          request.startDate,
          request.endDate
        );
        bars = loaded.get(request.symbol);
      } catch (error) {
        throw new BacktestSetupError('Could not load bars for single-instrument mode', {
          symbol: request.symbol,
          cause: toError(error).message,
        });
      }
    }

    if (!bars) {
      throw new BacktestSetupError('Single-instrument mode needs bars, or a symbol and a data source');
    }

    const inRange = bars
      .filter((bar) => bar.timestamp >= request.startDate && bar.timestamp <= request.endDate)
      .sort((a, b) => a.timestamp - b.timestamp);

    if (inRange.length === 0) {
      throw new BacktestSetupError('No bars within the requested date range', {
        startDate: toIsoDate(request.startDate),
        endDate: toIsoDate(request.endDate),
      });
    }

    const symbol = inRange[0].symbol;
    for (let i = 0; i < inRange.length; i++) {
      if (inRange[i].symbol !== symbol) {
        throw new BacktestSetupError('Single-instrument mode received bars for more than one instrument', {
          symbols: [symbol, inRange[i].symbol],
        });
      }
      if (i > 0 && inRange[i].timestamp === inRange[i - 1].timestamp) {
        throw new BacktestSetupError('Duplicate bar timestamp', { symbol, timestamp: inRange[i].timestamp });
      }
    }

    return inRange;
  }
}

function validateDateRange(startDate: number, endDate: number): void {
  if (!Number.isFinite(startDate) || !Number.isFinite(endDate)) {
    throw new BacktestSetupError('Start and end dates must be valid timestamps', { startDate, endDate });
  }
  if (startDate > endDate) {
    throw new BacktestSetupError('Start date is after end date', {
      startDate: toIsoDate(startDate),
      endDate: toIsoDate(endDate),
    });
  }
}

/**
 * Signals in emission order as signed deltas; empty or invalid quantities are ignored
 */
function toDeltas(signals: readonly OrderSignal[]): Array<[string, number]> {
  return signals
    .filter((s) => Number.isFinite(s.quantity) && s.quantity > 0)
    .map((s): [string, number] => [s.symbol, s.side === 'buy' ? s.quantity : -s.quantity]);
}

/**
 * The bar each instrument trades at for `date`: the last bar of the day from
 * the OHLC series, else a flat bar at the snapshot price
 */
function sessionBars(
  run: RunState,
  symbols: readonly string[],
  ohlc: ReadonlyMap<string, Candle[]>,
  snapshot: MarketSnapshot,
  date: number
): Map<string, Candle> {
  const bars = new Map<string, Candle>();
  const snapshotPrices = new Map(snapshot.map((row) => [row.symbol, row.price]));

  for (const symbol of symbols) {
    const series = ohlc.get(symbol);
    const bar = series && series.length > 0 ? series[series.length - 1] : undefined;
    if (bar) {
      bars.set(symbol, bar);
      continue;
    }

    const price = snapshotPrices.get(symbol);
    if (price !== undefined && Number.isFinite(price) && price > 0) {
      run.diagnostics.warn({
        timestamp: date,
        code: 'ohlc-missing',
        symbol,
        message: `No bar for ${symbol}; trading at the snapshot price`,
      });
      bars.set(symbol, { symbol, timestamp: date, open: price, high: price, low: price, close: price, volume: 0 });
    }
  }

  return bars;
}

function unavailable(what: 'snapshot' | 'ohlc', date: number, cause: unknown): DataUnavailableError {
  return new DataUnavailableError(`Market ${what} unavailable for ${toIsoDate(date)}`, {
    date: toIsoDate(date),
    cause: toError(cause).message,
  });
}
