/**
 * Program builder
 *
 * Command modules register themselves in commandRegistry when imported;
 * registerXCommands functions add Commander options and wire them to the
 * registered handlers.
 */

import { Command } from 'commander';
import { registerBacktestCommands, type RegisterBacktestOptions } from '../commands/backtest.js';

export const CLI_VERSION = '1.0.0';

export function createProgram(options: RegisterBacktestOptions = {}): Command {
  const program = new Command();

  program
    .name('backtest-lab')
    .description('Portfolio and single-instrument backtests over local market data')
    .version(CLI_VERSION);

  registerBacktestCommands(program, options);

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });

  return program;
}
