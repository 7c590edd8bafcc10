/**
 * Indicator Series Utilities
 *
 * Array-based indicator calculations over closing prices and other value
 * series. Point functions evaluate at the last element and return null until
 * enough values are available.
 */

import type { Bar } from '@tradelab/core';

export function closeSeries(bars: readonly Bar[]): number[] {
  return bars.map((b) => b.close);
}

export function highSeries(bars: readonly Bar[]): number[] {
  return bars.map((b) => b.high);
}

export function lowSeries(bars: readonly Bar[]): number[] {
  return bars.map((b) => b.low);
}

function tail(values: readonly number[], period: number): readonly number[] | null {
  if (!Number.isInteger(period) || period < 1 || values.length < period) {
    return null;
  }
  return values.slice(values.length - period);
}

/**
 * Simple Moving Average of the last `period` values
 */
export function sma(values: readonly number[], period: number): number | null {
  const window = tail(values, period);
  if (!window) return null;
  return window.reduce((sum, v) => sum + v, 0) / period;
}

/**
 * Exponential Moving Average over a value array
 *
 * Seeded with the first value, smoothing factor 2 / (period + 1).
 */
export function emaSeries(values: readonly number[], period: number): number[] {
  const out: number[] = [];
  if (values.length === 0 || period < 1) return out;

  const k = 2 / (period + 1);
  let prev = values[0];
  out.push(prev);
  for (let i = 1; i < values.length; i++) {
    prev = prev + k * (values[i] - prev);
    out.push(prev);
  }
  return out;
}

/**
 * Sample standard deviation (n - 1) of the last `period` values
 */
export function stdDev(values: readonly number[], period: number): number | null {
  const window = tail(values, period);
  if (!window || period < 2) return null;

  const mean = window.reduce((sum, v) => sum + v, 0) / period;
  const variance = window.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (period - 1);
  return Math.sqrt(variance);
}

/**
 * Relative Strength Index from simple averages of the last `period` changes
 *
 * 100 when there are gains and no losses; null when the window is flat.
 */
export function rsi(values: readonly number[], period: number): number | null {
  const window = tail(values, period + 1);
  if (!window) return null;

  let gainSum = 0;
  let lossSum = 0;
  for (let i = 1; i < window.length; i++) {
    const change = window[i] - window[i - 1];
    if (change > 0) {
      gainSum += change;
    } else {
      lossSum -= change;
    }
  }

  if (lossSum === 0) {
    return gainSum === 0 ? null : 100;
  }

  const rs = gainSum / period / (lossSum / period);
  return 100 - 100 / (1 + rs);
}

/**
 * Percentage change over `period` values
 */
export function rateOfChange(values: readonly number[], period: number): number | null {
  const window = tail(values, period + 1);
  if (!window) return null;
  const base = window[0];
  if (base === 0) return null;
  return ((window[window.length - 1] - base) / base) * 100;
}

/**
 * Highest of the last `period` values
 */
export function highest(values: readonly number[], period: number): number | null {
  const window = tail(values, period);
  return window ? Math.max(...window) : null;
}

/**
 * Lowest of the last `period` values
 */
export function lowest(values: readonly number[], period: number): number | null {
  const window = tail(values, period);
  return window ? Math.min(...window) : null;
}

export interface MacdPoint {
  macd: number;
  signal: number;
}

/**
 * MACD line (fast EMA - slow EMA) and its EMA signal line, point by point
 */
export function macdSeries(
  values: readonly number[],
  fast: number,
  slow: number,
  signal: number
): MacdPoint[] {
  const fastEma = emaSeries(values, fast);
  const slowEma = emaSeries(values, slow);
  const macdLine = fastEma.map((f, i) => f - slowEma[i]);
  const signalLine = emaSeries(macdLine, signal);
  return macdLine.map((macd, i) => ({ macd, signal: signalLine[i] }));
}

/**
 * True when `a` crosses above `b` between the previous and current points
 */
export function crossesAbove(prevA: number, prevB: number, currA: number, currB: number): boolean {
  return prevA <= prevB && currA > currB;
}

/**
 * True when `a` crosses below `b` between the previous and current points
 */
export function crossesBelow(prevA: number, prevB: number, currA: number, currB: number): boolean {
  return prevA >= prevB && currA < currB;
}
