/**
 * Metrics Types
 */

import { z } from 'zod';
import type { ExitReason } from '@tradelab/core';

/**
 * A metric is a number, or a sentinel when the statistic has no finite value.
 * Sentinels are never coerced to 0 or NaN.
 */
export type MetricValue = number | 'undefined' | 'infinite';

export const MetricsOptionsSchema = z
  .object({
    /** Bars per year used to annualize volatility and ratios */
    periodsPerYear: z.number().int().positive().default(252),
    /** Annual risk-free rate, as a fraction */
    riskFreeRate: z.number().finite().default(0.02),
    /** Confidence level for VaR and CVaR */
    confidenceLevel: z.number().gt(0).lt(1).default(0.95),
  })
  .strict();

export type MetricsOptions = z.output<typeof MetricsOptionsSchema>;

export type MetricsOptionsInput = z.input<typeof MetricsOptionsSchema>;

export interface TradeStatistics {
  readonly totalTrades: number;
  readonly winningTrades: number;
  readonly losingTrades: number;
  readonly winRate: MetricValue;
  readonly profitFactor: MetricValue;
  readonly expectancy: MetricValue;
  readonly averageWin: MetricValue;
  readonly averageLoss: MetricValue;
  readonly largestWin: MetricValue;
  readonly largestLoss: MetricValue;
  /** Longest run of winning trades; a count, so 0 with no trades */
  readonly maxConsecutiveWins: number;
  readonly maxConsecutiveLosses: number;
  readonly averageBarsHeld: MetricValue;
  readonly totalCommission: number;
  readonly totalSlippage: number;
  readonly exitReasons: Readonly<Record<ExitReason, number>>;
}

export interface DrawdownStatistics {
  /** Deepest drawdown as a negative fraction, in [-1, 0] */
  readonly maxDrawdown: number;
  /** Longest stretch below a prior peak, in bars */
  readonly maxDrawdownDuration: number;
  /** Bars since the last peak at the end of the curve */
  readonly underwaterBars: number;
  readonly ulcerIndex: number;
}

export interface PerformanceMetrics extends TradeStatistics, DrawdownStatistics {
  readonly totalReturn: number;
  readonly cagr: MetricValue;
  readonly volatility: MetricValue;
  readonly sharpeRatio: MetricValue;
  readonly sortinoRatio: MetricValue;
  readonly calmarRatio: MetricValue;
  readonly valueAtRisk: MetricValue;
  readonly conditionalValueAtRisk: MetricValue;
  /** Number of periodic returns the risk statistics were computed from */
  readonly returnCount: number;
}

/**
 * Metric keys usable as an optimization objective
 */
export type ObjectiveMetric =
  | 'sharpeRatio'
  | 'sortinoRatio'
  | 'calmarRatio'
  | 'totalReturn'
  | 'cagr'
  | 'profitFactor'
  | 'winRate'
  | 'expectancy'
  | 'maxDrawdown';

export const OBJECTIVE_METRICS: readonly ObjectiveMetric[] = [
  'sharpeRatio',
  'sortinoRatio',
  'calmarRatio',
  'totalReturn',
  'cagr',
  'profitFactor',
  'winRate',
  'expectancy',
  'maxDrawdown',
];

/**
 * Map a non-finite number onto its sentinel: +Infinity is 'infinite', NaN and
 * -Infinity are 'undefined'.
 */
export function normalizeMetric(value: MetricValue): MetricValue {
  if (typeof value !== 'number' || Number.isFinite(value)) return value;
  return value === Infinity ? 'infinite' : 'undefined';
}
