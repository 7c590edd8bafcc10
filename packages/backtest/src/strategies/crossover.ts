/**
 * Crossover Strategies
 *
 * Moving-average and MACD crossovers. Each evaluates the indicator at the
 * current and the previous bar and reacts only on the bar where the lines cross.
 */

import { z } from 'zod';
import type { Signal } from '@tradelab/core';
import { closeSeries, crossesAbove, crossesBelow, emaSeries, macdSeries, sma } from '../indicators/series.js';
import { defineStrategy, HOLD } from './types.js';

const SideSchema = z.enum(['long', 'short']).default('long');

type Side = z.output<typeof SideSchema>;

function crossoverSignal(side: Side, golden: boolean, death: boolean): Signal {
  if (side === 'long') {
    if (golden) return { action: 'enter_long' };
    if (death) return { action: 'exit' };
  } else {
    if (death) return { action: 'enter_short' };
    if (golden) return { action: 'exit' };
  }
  return HOLD;
}

function periodPairSchema(fast: number, slow: number) {
  return z
    .object({
      fastPeriod: z.number().int().min(1).default(fast),
      slowPeriod: z.number().int().min(2).default(slow),
      side: SideSchema,
    })
    .strict()
    .refine((p) => p.fastPeriod < p.slowPeriod, {
      message: 'must be less than slowPeriod',
      path: ['fastPeriod'],
    });
}

export const smaCrossover = defineStrategy({
  name: 'sma_crossover',
  description: 'Simple moving average crossover: golden cross enters, death cross exits',
  schema: periodPairSchema(20, 50),
  lookback: (p) => p.slowPeriod + 1,
  signal(window, p) {
    const closes = closeSeries(window);
    const previous = closes.slice(0, -1);
    const currFast = sma(closes, p.fastPeriod);
    const currSlow = sma(closes, p.slowPeriod);
    const prevFast = sma(previous, p.fastPeriod);
    const prevSlow = sma(previous, p.slowPeriod);
    if (currFast === null || currSlow === null || prevFast === null || prevSlow === null) {
      return HOLD;
    }

    return crossoverSignal(
      p.side,
      crossesAbove(prevFast, prevSlow, currFast, currSlow),
      crossesBelow(prevFast, prevSlow, currFast, currSlow)
    );
  },
});

export const emaCrossover = defineStrategy({
  name: 'ema_crossover',
  description: 'Exponential moving average crossover',
  schema: periodPairSchema(12, 26),
  lookback: (p) => p.slowPeriod + 1,
  signal(window, p) {
    if (window.length < 2) return HOLD;

    const closes = closeSeries(window);
    const fast = emaSeries(closes, p.fastPeriod);
    const slow = emaSeries(closes, p.slowPeriod);
    const n = closes.length;

    return crossoverSignal(
      p.side,
      crossesAbove(fast[n - 2], slow[n - 2], fast[n - 1], slow[n - 1]),
      crossesBelow(fast[n - 2], slow[n - 2], fast[n - 1], slow[n - 1])
    );
  },
});

export const macdCrossover = defineStrategy({
  name: 'macd',
  description: 'MACD signal line crossover',
  schema: z
    .object({
      fast: z.number().int().min(1).default(12),
      slow: z.number().int().min(2).default(26),
      signal: z.number().int().min(1).default(9),
    })
    .strict()
    .refine((p) => p.fast < p.slow, { message: 'must be less than slow', path: ['fast'] }),
  lookback: (p) => p.slow + p.signal,
  signal(window, p) {
    if (window.length < 2) return HOLD;

    const points = macdSeries(closeSeries(window), p.fast, p.slow, p.signal);
    const prev = points[points.length - 2];
    const curr = points[points.length - 1];

    if (crossesAbove(prev.macd, prev.signal, curr.macd, curr.signal)) {
      return { action: 'enter_long' };
    }
    if (crossesBelow(prev.macd, prev.signal, curr.macd, curr.signal)) {
      return { action: 'exit' };
    }
    return HOLD;
  },
});
