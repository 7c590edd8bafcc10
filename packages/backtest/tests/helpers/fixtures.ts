/**
 * Test fixtures: bar builders and a scripted strategy
 */

import { z } from 'zod';
import type { Bar, Signal, SimulationConfig } from '@tradelab/core';
import { validateSimulationConfig } from '../../src/config.js';
import { createPriceSeries } from '../../src/series/price-series.js';
import { defineStrategy, HOLD } from '../../src/strategies/types.js';
import type { Strategy } from '../../src/strategies/types.js';

/** 2024-01-01T00:00:00Z */
export const START = 1_704_067_200;
export const DAY = 86_400;

export function bar(index: number, open: number, high: number, low: number, close: number): Bar {
  return { timestamp: START + index * DAY, open, high, low, close, volume: 1000 };
}

/**
 * Daily bars whose open, high and low all equal the close
 */
export function flatBars(closes: readonly number[]): Bar[] {
  return closes.map((close, i) => bar(i, close, close, close, close));
}

export function series(bars: readonly Bar[], symbol = 'TEST') {
  return createPriceSeries(symbol, '1d', bars);
}

/** No commission, no slippage, full allocation */
export const FRICTIONLESS: SimulationConfig = validateSimulationConfig({
  commissionRate: 0,
  slippageRate: 0,
  maxPositionFraction: 1,
});

/**
 * Strategy that emits the given signal at each listed bar index
 */
export function scripted(script: Readonly<Record<number, Signal>>, lookback = 1): Strategy {
  return defineStrategy({
    name: 'scripted',
    description: 'Signals at fixed bar indices',
    schema: z.object({}).strict(),
    lookback: () => lookback,
    signal: (window) => script[window.length - 1] ?? HOLD,
  });
}

export const ENTER_LONG: Signal = { action: 'enter_long' };
export const ENTER_SHORT: Signal = { action: 'enter_short' };
export const EXIT: Signal = { action: 'exit' };
