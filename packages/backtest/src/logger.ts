/**
 * Backtest Package Logger
 * =======================
 * Centralized logger for the backtest package with namespace '@tradelab/backtest'
 */

import { createPackageLogger } from '@tradelab/utils';

export const logger = createPackageLogger('@tradelab/backtest');
