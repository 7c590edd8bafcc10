/**
 * Configuration loading from environment variables
 *
 * Reads BACKTEST_* overrides for simulation and metrics settings.
 */

import { InvalidParameterError } from '@tradelab/core';

export interface BacktestEnvOverrides {
  initialCapital?: number;
  commissionRate?: number;
  slippageRate?: number;
  maxPositionFraction?: number;
  stopLossPct?: number;
  takeProfitPct?: number;
  exitPriority?: string;
  confidenceLevel?: number;
}

const NUMERIC_ENV_KEYS = {
  BACKTEST_INITIAL_CAPITAL: 'initialCapital',
  BACKTEST_COMMISSION_RATE: 'commissionRate',
  BACKTEST_SLIPPAGE_RATE: 'slippageRate',
  BACKTEST_MAX_POSITION_FRACTION: 'maxPositionFraction',
  BACKTEST_STOP_LOSS_PCT: 'stopLossPct',
  BACKTEST_TAKE_PROFIT_PCT: 'takeProfitPct',
  BACKTEST_CONFIDENCE_LEVEL: 'confidenceLevel',
} as const;

type NumericEnvKey = keyof typeof NUMERIC_ENV_KEYS;

const NUMERIC_ENV_NAMES: readonly NumericEnvKey[] = [
  'BACKTEST_INITIAL_CAPITAL',
  'BACKTEST_COMMISSION_RATE',
  'BACKTEST_SLIPPAGE_RATE',
  'BACKTEST_MAX_POSITION_FRACTION',
  'BACKTEST_STOP_LOSS_PCT',
  'BACKTEST_TAKE_PROFIT_PCT',
  'BACKTEST_CONFIDENCE_LEVEL',
];

/**
 * Parse a numeric environment variable, failing on anything non-numeric
 */
export function parseNumericEnv(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new InvalidParameterError(`${name} must be a number, got '${raw}'`, name, { value: raw });
  }
  return value;
}

/**
 * Load backtest overrides from environment variables
 */
export function getBacktestEnvOverrides(env: NodeJS.ProcessEnv = process.env): BacktestEnvOverrides {
  const overrides: BacktestEnvOverrides = {};

  for (const name of NUMERIC_ENV_NAMES) {
    const raw = env[name];
    if (raw !== undefined) {
      overrides[NUMERIC_ENV_KEYS[name]] = parseNumericEnv(name, raw);
    }
  }

  if (env.BACKTEST_EXIT_PRIORITY) {
    overrides.exitPriority = env.BACKTEST_EXIT_PRIORITY;
  }

  return overrides;
}
