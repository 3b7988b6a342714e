/**
 * Simulation Package Logger
 * =========================
 * Centralized logger for the simulation package with namespace '@backtest-lab/simulation'
 */

import { createPackageLogger } from '@backtest-lab/utils';

export const logger = createPackageLogger('@backtest-lab/simulation');
