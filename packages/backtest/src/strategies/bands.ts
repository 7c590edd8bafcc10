/**
 * Band Strategies
 *
 * Bollinger band mean reversion and channel breakout.
 */

import { z } from 'zod';
import type { Bar } from '@tradelab/core';
import { closeSeries, highSeries, highest, lowSeries, lowest, sma, stdDev } from '../indicators/series.js';
import { defineStrategy, HOLD } from './types.js';

interface Bands {
  upper: number;
  lower: number;
}

function bollinger(closes: readonly number[], period: number, width: number): Bands | null {
  const mid = sma(closes, period);
  const sd = stdDev(closes, period);
  if (mid === null || sd === null || sd === 0) return null;
  return { upper: mid + sd * width, lower: mid - sd * width };
}

export const bollingerBands = defineStrategy({
  name: 'bollinger_bands',
  description: 'Bollinger band mean reversion: enter below the lower band, exit above the upper band',
  schema: z
    .object({
      period: z.number().int().min(2).default(20),
      stdDev: z.number().positive().default(2),
    })
    .strict(),
  lookback: (p) => p.period + 1,
  signal(window, p) {
    const closes = closeSeries(window);
    const previous = closes.slice(0, -1);
    const curr = bollinger(closes, p.period, p.stdDev);
    const prev = bollinger(previous, p.period, p.stdDev);
    if (curr === null || prev === null) return HOLD;

    const currClose = closes[closes.length - 1];
    const prevClose = previous[previous.length - 1];

    if (prevClose >= prev.lower && currClose < curr.lower) {
      return { action: 'enter_long' };
    }
    if (prevClose <= prev.upper && currClose > curr.upper) {
      return { action: 'exit' };
    }
    return HOLD;
  },
});

/**
 * Channel of the `lookback` bars before the current one
 */
function priorChannel(window: readonly Bar[], lookback: number): Bands | null {
  const prior = window.slice(0, -1);
  const upper = highest(highSeries(prior), lookback);
  const lower = lowest(lowSeries(prior), lookback);
  if (upper === null || lower === null) return null;
  return { upper, lower };
}

export const breakout = defineStrategy({
  name: 'breakout',
  description: 'Price breakout above the recent high, breakdown below the recent low',
  schema: z
    .object({
      lookback: z.number().int().min(1).default(20),
      /** Percent beyond the channel required to trigger */
      threshold: z.number().min(0).lt(100).default(0),
      side: z.enum(['long', 'short']).default('long'),
    })
    .strict(),
  lookback: (p) => p.lookback + 1,
  signal(window, p) {
    const channel = priorChannel(window, p.lookback);
    if (channel === null) return HOLD;

    const close = window[window.length - 1].close;
    const resistance = channel.upper * (1 + p.threshold / 100);
    const support = channel.lower * (1 - p.threshold / 100);
    const above = close > resistance;
    const below = close < support;

    if (p.side === 'long') {
      if (above) return { action: 'enter_long' };
      if (below) return { action: 'exit' };
    } else {
      if (below) return { action: 'enter_short' };
      if (above) return { action: 'exit' };
    }
    return HOLD;
  },
});
