/**
 * Market Data Domain Types
 */

/**
 * Bar type representing OHLCV data for a specific time interval.
 */
export interface Bar {
  readonly timestamp: number; // UNIX timestamp (seconds UTC)
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export type BarInterval = '1m' | '5m' | '15m' | '30m' | '1h' | '4h' | '1d' | '1w';

export const BAR_INTERVALS: readonly BarInterval[] = ['1m', '5m', '15m', '30m', '1h', '4h', '1d', '1w'];

export function isBarInterval(value: unknown): value is BarInterval {
  return BAR_INTERVALS.some((interval) => interval === value);
}

/**
 * Ordered bars for one symbol and one interval.
 *
 * Timestamps are strictly increasing. Instances are frozen; build them with
 * `createPriceSeries` from @tradelab/backtest so integrity is checked once.
 */
export interface PriceSeries {
  readonly symbol: string;
  readonly interval: BarInterval;
  readonly bars: readonly Bar[];
}
