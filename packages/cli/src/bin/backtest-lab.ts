#!/usr/bin/env node

/**
 * backtest-lab CLI entry point
 */

import { createProgram } from '../core/program.js';
import { die } from '../core/error-handler.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => die(error));
