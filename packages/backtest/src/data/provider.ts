/**
 * Bar Source Interfaces
 * =====================
 * Boundary between the engine and wherever bars come from.
 */

import type { DateTime } from 'luxon';
import type { BarInterval, PriceSeries } from '@tradelab/core';

/**
 * Bar fetch request
 */
export interface BarRequest {
  /** Instrument symbol */
  symbol: string;
  /** Bar interval */
  interval: BarInterval;
  /** Inclusive start; open-ended when omitted */
  start?: DateTime;
  /** Inclusive end; open-ended when omitted */
  end?: DateTime;
}

/**
 * Source of validated price series
 */
export interface BarSource {
  /** Source name */
  readonly name: string;

  /**
   * Fetch bars for the request, validated through createPriceSeries
   */
  fetchBars(request: BarRequest): Promise<PriceSeries>;
}

/**
 * Cache key for a request
 */
export function barRequestKey(request: BarRequest): string {
  const start = request.start ? String(request.start.toSeconds()) : '';
  const end = request.end ? String(request.end.toSeconds()) : '';
  return `${request.symbol}:${request.interval}:${start}:${end}`;
}
