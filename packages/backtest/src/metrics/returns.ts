/**
 * Return series statistics
 */

import type { EquityPoint } from '@tradelab/core';

/**
 * Percentage change between consecutive equity points
 *
 * Steps whose previous equity is not positive have no defined return and are
 * left out.
 */
export function periodicReturns(equityCurve: readonly EquityPoint[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < equityCurve.length; i++) {
    const previous = equityCurve[i - 1].equity;
    if (previous > 0) {
      returns.push(equityCurve[i].equity / previous - 1);
    }
  }
  return returns;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1); null with fewer than two values
 */
export function sampleStdDev(values: readonly number[]): number | null {
  const m = mean(values);
  if (m === null || values.length < 2) return null;
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Empirical quantile with linear interpolation between order statistics
 */
export function quantile(values: readonly number[], q: number): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const position = q * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const weight = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}
