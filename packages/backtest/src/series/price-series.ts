/**
 * Price Series Construction
 *
 * Validates bar sequences once, at construction, so the simulator can trust
 * every series it receives. Integrity failures are upstream data defects and
 * raise DataIntegrityError rather than being skipped.
 */

import { BAR_INTERVALS, DataIntegrityError, InvalidParameterError, isBarInterval } from '@tradelab/core';
import type { Bar, BarInterval, PriceSeries } from '@tradelab/core';

export type BarIssue =
  | 'non_finite_price'
  | 'non_positive_price'
  | 'invalid_volume'
  | 'high_less_than_low'
  | 'ohlc_inconsistent'
  | 'invalid_timestamp'
  | 'duplicate_timestamp'
  | 'non_monotonic_timestamps';

export type BarValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly issue: BarIssue; readonly index: number; readonly message: string };

type BarCheck = { issue: BarIssue; message: string } | null;

/**
 * Validate a single bar
 */
export function validateBar(bar: Bar): BarCheck {
  if (!Number.isFinite(bar.timestamp)) {
    return { issue: 'invalid_timestamp', message: 'timestamp is not a finite number' };
  }

  const prices = [bar.open, bar.high, bar.low, bar.close];
  if (prices.some((price) => !Number.isFinite(price))) {
    return { issue: 'non_finite_price', message: 'price is not a finite number' };
  }
  if (prices.some((price) => price <= 0)) {
    return { issue: 'non_positive_price', message: 'price must be positive' };
  }

  if (!Number.isFinite(bar.volume) || bar.volume < 0) {
    return { issue: 'invalid_volume', message: 'volume must be a non-negative finite number' };
  }

  // OHLC consistency
  if (bar.high < bar.low) {
    return { issue: 'high_less_than_low', message: `high ${bar.high} is below low ${bar.low}` };
  }
  if (bar.open > bar.high || bar.open < bar.low || bar.close > bar.high || bar.close < bar.low) {
    return { issue: 'ohlc_inconsistent', message: 'open and close must lie within [low, high]' };
  }

  return null;
}

/**
 * Validate a bar sequence without throwing
 *
 * An empty sequence is valid; too few bars is a run precondition, not a data defect.
 */
export function validateBars(bars: readonly Bar[]): BarValidationResult {
  for (let i = 0; i < bars.length; i++) {
    const bar = bars[i];
    const check = validateBar(bar);
    if (check) {
      return { valid: false, index: i, ...check };
    }

    if (i > 0) {
      const previous = bars[i - 1].timestamp;
      if (bar.timestamp === previous) {
        return {
          valid: false,
          issue: 'duplicate_timestamp',
          index: i,
          message: `timestamp ${bar.timestamp} repeats the previous bar`,
        };
      }
      if (bar.timestamp < previous) {
        return {
          valid: false,
          issue: 'non_monotonic_timestamps',
          index: i,
          message: `timestamp ${bar.timestamp} precedes the previous bar at ${previous}`,
        };
      }
    }
  }

  return { valid: true };
}

/**
 * Throw DataIntegrityError on the first defect
 */
export function assertBarIntegrity(bars: readonly Bar[], context: Record<string, unknown> = {}): void {
  const result = validateBars(bars);
  if (!result.valid) {
    const timestamp = bars[result.index]?.timestamp;
    throw new DataIntegrityError(`Bar ${result.index}: ${result.message}`, result.issue, {
      ...context,
      index: result.index,
      ...(timestamp !== undefined ? { timestamp } : {}),
    });
  }
}

function freezeBar(bar: Bar): Bar {
  return Object.freeze({
    timestamp: bar.timestamp,
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    volume: bar.volume,
  });
}

/**
 * Build a validated, frozen price series
 *
 * @throws InvalidParameterError for an unknown interval
 * @throws DataIntegrityError for a defective bar sequence
 */
export function createPriceSeries(symbol: string, interval: BarInterval, bars: readonly Bar[]): PriceSeries {
  if (!isBarInterval(interval)) {
    throw new InvalidParameterError(
      `Unknown interval: ${String(interval)}. Available: ${BAR_INTERVALS.join(', ')}`,
      'interval',
      { value: interval }
    );
  }
  assertBarIntegrity(bars, { symbol, interval });

  return Object.freeze({
    symbol,
    interval,
    bars: Object.freeze(bars.map(freezeBar)),
  });
}
