/**
 * Backtest Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { defineCommand } from '../core/defineCommand.js';
import { coerceJson } from '../core/coerce.js';
import { commandRegistry, createCommand } from '../core/command-registry.js';
import type { CommandContext } from '../core/command-context.js';
import { backtestRunSchema, backtestSweepSchema } from '../command-defs/backtest.js';
import { runBacktestHandler } from '../handlers/backtest/run-backtest.js';
import { sweepBacktestHandler } from '../handlers/backtest/sweep-backtest.js';

export interface RegisterBacktestOptions {
  context?: () => CommandContext;
  onError?: (e: unknown) => never;
}

function addBacktestFlags(cmd: Command): Command {
  return cmd
    .requiredOption('--data <file>', 'Dataset JSON file ({ snapshots, bars })')
    .requiredOption('--strategy <name>', 'Strategy: top-volume, value, ma-cross')
    .option('--params <json>', 'Strategy parameters as JSON, e.g. {"maxStocks":5}')
    .requiredOption('--from <date>', 'Start date (ISO 8601, UTC)')
    .requiredOption('--to <date>', 'End date (ISO 8601, UTC, inclusive)')
    .option('--capital <number>', 'Initial capital')
    .option('--commission-rate <number>', 'Commission as a fraction of notional')
    .option('--min-commission <number>', 'Minimum commission per fill')
    .option('--slippage <number>', 'Slippage as a fraction of price')
    .option('--trade-price <field>', 'Bar price fills execute at: open, close, vwap')
    .option('--max-positions <number>', 'Maximum simultaneously held instruments')
    .option('--min-rebalance-cost <number>', 'Skip rebalance orders below this notional')
    .option('--rebalance-every <number>', 'Rebalance every N sessions (portfolio strategies)')
    .option('--allow-short', 'Treat sells without long exposure as normal short lots')
    .option('--symbol <symbol>', 'Instrument for single-instrument strategies')
    .option('--format <format>', 'Output format (json, table)', 'table');
}

/**
 * Register backtest commands
 */
export function registerBacktestCommands(program: Command, options: RegisterBacktestOptions = {}): void {
  if (program.commands.find((cmd) => cmd.name() === 'backtest')) {
    return;
  }

  const backtestCmd = program.command('backtest').description('Backtest operations');

  const runCmd = addBacktestFlags(backtestCmd.command('run').description('Run one backtest over a dataset'));
  defineCommand(runCmd, {
    name: 'run',
    packageName: 'backtest',
    coerce: (raw) => ({ ...raw, params: coerceJson(raw.params, 'params') }),
    context: options.context,
    onError: options.onError,
  });

  const sweepCmd = addBacktestFlags(
    backtestCmd.command('sweep').description('Run one backtest per parameter combination')
  )
    .requiredOption('--grid <json>', 'Parameter grid as JSON, e.g. {"shortPeriod":[3,5],"longPeriod":[20,60]}')
    .option('--concurrency <number>', 'Backtests in flight at once', '4');
  defineCommand(sweepCmd, {
    name: 'sweep',
    packageName: 'backtest',
    coerce: (raw) => ({
      ...raw,
      params: coerceJson(raw.params, 'params'),
      grid: coerceJson(raw.grid, 'grid'),
    }),
    context: options.context,
    onError: options.onError,
  });
}

const backtestModule: PackageCommandModule = {
  packageName: 'backtest',
  description: 'Portfolio and single-instrument backtests',
  commands: [
    createCommand({
      name: 'run',
      description: 'Run one backtest over a dataset',
      schema: backtestRunSchema,
      handler: runBacktestHandler,
      examples: [
        'backtest-lab backtest run --data market.json --strategy top-volume --from 2024-01-01 --to 2024-06-30',
      ],
    }),
    createCommand({
      name: 'sweep',
      description: 'Run one backtest per parameter combination',
      schema: backtestSweepSchema,
      handler: sweepBacktestHandler,
      examples: [
        'backtest-lab backtest sweep --data market.json --strategy ma-cross --symbol AAA --from 2024-01-01 --to 2024-12-31 --grid \'{"shortPeriod":[3,5]}\'',
      ],
    }),
  ],
};

commandRegistry.registerPackage(backtestModule);
