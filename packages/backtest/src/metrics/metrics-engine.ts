/**
 * Metrics Engine
 * ==============
 * Derives return, risk, drawdown and trade statistics from a BacktestResult.
 * All ratios are fractions; undefined or unbounded values come back as
 * sentinels.
 */

import type { BacktestResult } from '@tradelab/core';
import { parseOrThrow } from '../validation.js';
import { computeDrawdownStatistics } from './drawdown.js';
import { periodicReturns } from './returns.js';
import { annualizedVolatility, cagr, calmarRatio, sharpeRatio, sortinoRatio, tailRisk } from './risk.js';
import { computeTradeStatistics } from './trade-stats.js';
import { MetricsOptionsSchema } from './types.js';
import type { MetricsOptions, MetricsOptionsInput, PerformanceMetrics } from './types.js';

/**
 * Validate metrics options, applying defaults
 */
export function validateMetricsOptions(options: MetricsOptionsInput = {}): MetricsOptions {
  return parseOrThrow(MetricsOptionsSchema, options, 'Invalid metrics options');
}

export function computeMetrics(result: BacktestResult, options: MetricsOptionsInput = {}): PerformanceMetrics {
  const { periodsPerYear, riskFreeRate, confidenceLevel } = validateMetricsOptions(options);

  const returns = periodicReturns(result.equityCurve);
  const drawdown = computeDrawdownStatistics(result.equityCurve);
  const growth = cagr(result.initialCapital, result.finalEquity, result.period.start, result.period.end);

  return Object.freeze({
    totalReturn: result.finalEquity / result.initialCapital - 1,
    cagr: growth,
    volatility: annualizedVolatility(returns, periodsPerYear),
    sharpeRatio: sharpeRatio(returns, riskFreeRate, periodsPerYear),
    sortinoRatio: sortinoRatio(returns, riskFreeRate, periodsPerYear),
    calmarRatio: calmarRatio(growth, drawdown.maxDrawdown),
    ...tailRisk(returns, confidenceLevel),
    ...drawdown,
    ...computeTradeStatistics(result.trades),
    returnCount: returns.length,
  });
}
