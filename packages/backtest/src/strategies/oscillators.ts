/**
 * Oscillator Strategies
 *
 * RSI reversal, z-score mean reversion and rate-of-change momentum.
 */

import { z } from 'zod';
import { closeSeries, rateOfChange, rsi, sma, stdDev } from '../indicators/series.js';
import { defineStrategy, HOLD } from './types.js';

export const rsiReversal = defineStrategy({
  name: 'rsi_reversal',
  description: 'RSI overbought/oversold reversal',
  schema: z
    .object({
      period: z.number().int().min(2).default(14),
      oversold: z.number().gt(0).lt(100).default(30),
      overbought: z.number().gt(0).lt(100).default(70),
    })
    .strict()
    .refine((p) => p.oversold < p.overbought, { message: 'must be less than overbought', path: ['oversold'] }),
  lookback: (p) => p.period + 2,
  signal(window, p) {
    const closes = closeSeries(window);
    const curr = rsi(closes, p.period);
    const prev = rsi(closes.slice(0, -1), p.period);
    if (curr === null || prev === null) return HOLD;

    // Crosses up out of oversold
    if (prev <= p.oversold && curr > p.oversold) {
      return { action: 'enter_long' };
    }
    // Crosses down out of overbought
    if (prev >= p.overbought && curr < p.overbought) {
      return { action: 'exit' };
    }
    return HOLD;
  },
});

function zScore(closes: readonly number[], period: number): number | null {
  const mean = sma(closes, period);
  const sd = stdDev(closes, period);
  if (mean === null || sd === null || sd === 0) return null;
  return (closes[closes.length - 1] - mean) / sd;
}

export const meanReversion = defineStrategy({
  name: 'mean_reversion',
  description: 'Mean reversion on the z-score of price against its moving average',
  schema: z
    .object({
      period: z.number().int().min(2).default(20),
      zThreshold: z.number().positive().default(2),
    })
    .strict(),
  lookback: (p) => p.period + 1,
  signal(window, p) {
    const closes = closeSeries(window);
    const curr = zScore(closes, p.period);
    const prev = zScore(closes.slice(0, -1), p.period);
    if (curr === null || prev === null) return HOLD;

    if (curr < -p.zThreshold && prev >= -p.zThreshold) {
      return { action: 'enter_long' };
    }
    if (curr >= 0 && prev < 0) {
      return { action: 'exit' };
    }
    return HOLD;
  },
});

export const momentum = defineStrategy({
  name: 'momentum',
  description: 'Rate of change momentum',
  schema: z
    .object({
      period: z.number().int().min(1).default(14),
      /** Percent change that triggers an entry */
      threshold: z.number().min(0).default(5),
    })
    .strict(),
  lookback: (p) => p.period + 2,
  signal(window, p) {
    const closes = closeSeries(window);
    const curr = rateOfChange(closes, p.period);
    const prev = rateOfChange(closes.slice(0, -1), p.period);
    if (curr === null || prev === null) return HOLD;

    if (prev <= p.threshold && curr > p.threshold) {
      return { action: 'enter_long' };
    }
    // Momentum turns negative
    if (prev >= 0 && curr < 0) {
      return { action: 'exit' };
    }
    return HOLD;
  },
});
