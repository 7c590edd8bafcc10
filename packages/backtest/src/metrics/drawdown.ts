/**
 * Drawdown analysis over an equity curve
 */

import type { EquityPoint } from '@tradelab/core';
import type { DrawdownStatistics } from './types.js';

export interface DrawdownPoint {
  readonly timestamp: number;
  readonly equity: number;
  /** equity / running peak - 1, clamped to [-1, 0] */
  readonly drawdown: number;
}

/**
 * Per-bar drawdown from the running peak
 */
export function drawdownSeries(equityCurve: readonly EquityPoint[]): DrawdownPoint[] {
  let peak = -Infinity;
  return equityCurve.map(({ timestamp, equity }) => {
    peak = Math.max(peak, equity);
    const drawdown = peak > 0 ? Math.max(-1, equity / peak - 1) : 0;
    return { timestamp, equity, drawdown };
  });
}

export function computeDrawdownStatistics(equityCurve: readonly EquityPoint[]): DrawdownStatistics {
  const series = drawdownSeries(equityCurve);

  let maxDrawdown = 0;
  let maxDrawdownDuration = 0;
  let currentRun = 0;
  let squaredSum = 0;

  for (const { drawdown } of series) {
    maxDrawdown = Math.min(maxDrawdown, drawdown);
    squaredSum += drawdown * drawdown;

    if (drawdown < 0) {
      currentRun += 1;
      maxDrawdownDuration = Math.max(maxDrawdownDuration, currentRun);
    } else {
      currentRun = 0;
    }
  }

  return {
    maxDrawdown,
    maxDrawdownDuration,
    // the run still open at the end of the curve
    underwaterBars: currentRun,
    ulcerIndex: series.length > 0 ? Math.sqrt(squaredSum / series.length) : 0,
  };
}
