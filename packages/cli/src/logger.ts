/**
 * CLI Package Logger
 */

import { createPackageLogger } from '@backtest-lab/utils';

export const logger = createPackageLogger('@backtest-lab/cli');
