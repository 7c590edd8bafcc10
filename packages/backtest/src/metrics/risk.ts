/**
 * Risk-adjusted return metrics
 *
 * Every function returns a sentinel instead of dividing by zero.
 */

import { DateTime } from 'luxon';
import type { MetricValue } from './types.js';
import { mean, quantile, sampleStdDev } from './returns.js';

const DAYS_PER_YEAR = 365.25;

/** Fewest returns the empirical VaR is computed from */
export const MIN_VAR_SAMPLES = 10;

/**
 * Compound annual growth rate over calendar time
 */
export function cagr(
  initialCapital: number,
  finalEquity: number,
  startTimestamp: number,
  endTimestamp: number
): MetricValue {
  const end = DateTime.fromSeconds(endTimestamp, { zone: 'utc' });
  const days = end.diff(DateTime.fromSeconds(startTimestamp, { zone: 'utc' }), 'days').days;
  const years = days / DAYS_PER_YEAR;
  if (years <= 0 || initialCapital <= 0) return 'undefined';
  if (finalEquity <= 0) return -1;
  return (finalEquity / initialCapital) ** (1 / years) - 1;
}

export function annualizedVolatility(returns: readonly number[], periodsPerYear: number): MetricValue {
  const sd = sampleStdDev(returns);
  return sd === null ? 'undefined' : sd * Math.sqrt(periodsPerYear);
}

function meanExcessReturn(returns: readonly number[], riskFreeRate: number, periodsPerYear: number): number | null {
  const periodRiskFree = riskFreeRate / periodsPerYear;
  return mean(returns.map((r) => r - periodRiskFree));
}

/**
 * Sharpe = mean(r - rf / periodsPerYear) / std(r) x sqrt(periodsPerYear)
 */
export function sharpeRatio(returns: readonly number[], riskFreeRate: number, periodsPerYear: number): MetricValue {
  const sd = sampleStdDev(returns);
  const excess = meanExcessReturn(returns, riskFreeRate, periodsPerYear);
  if (sd === null || sd === 0 || excess === null) return 'undefined';
  return (excess / sd) * Math.sqrt(periodsPerYear);
}

/**
 * Sortino: Sharpe's numerator over the sample std of the negative returns
 */
export function sortinoRatio(returns: readonly number[], riskFreeRate: number, periodsPerYear: number): MetricValue {
  const excess = meanExcessReturn(returns, riskFreeRate, periodsPerYear);
  if (excess === null || returns.length < 2) return 'undefined';

  const downside = returns.filter((r) => r < 0);
  if (downside.length === 0) {
    return excess > 0 ? 'infinite' : 'undefined';
  }

  const downsideDeviation = sampleStdDev(downside);
  if (downsideDeviation === null || downsideDeviation === 0) return 'undefined';
  return (excess / downsideDeviation) * Math.sqrt(periodsPerYear);
}

/**
 * Calmar = CAGR / |max drawdown|
 */
export function calmarRatio(cagrValue: MetricValue, maxDrawdown: number): MetricValue {
  if (typeof cagrValue !== 'number') return 'undefined';
  if (maxDrawdown === 0) {
    return cagrValue > 0 ? 'infinite' : 'undefined';
  }
  return cagrValue / Math.abs(maxDrawdown);
}

export interface TailRisk {
  valueAtRisk: MetricValue;
  conditionalValueAtRisk: MetricValue;
}

/**
 * Empirical VaR at `1 - confidenceLevel` and the mean of returns at or below it
 */
export function tailRisk(returns: readonly number[], confidenceLevel: number): TailRisk {
  if (returns.length < MIN_VAR_SAMPLES) {
    return { valueAtRisk: 'undefined', conditionalValueAtRisk: 'undefined' };
  }

  const valueAtRisk = quantile(returns, 1 - confidenceLevel);
  if (valueAtRisk === null) {
    return { valueAtRisk: 'undefined', conditionalValueAtRisk: 'undefined' };
  }

  const tail = mean(returns.filter((r) => r <= valueAtRisk));
  return { valueAtRisk, conditionalValueAtRisk: tail ?? valueAtRisk };
}
