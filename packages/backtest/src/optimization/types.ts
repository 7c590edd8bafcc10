/**
 * Optimization Types
 *
 * Types for parameter sweeps
 */

import type { BacktestErrorCode, BacktestResult, ParameterGrid, ParameterSet, PriceSeries } from '@tradelab/core';
import type { SimulationConfigInput } from '../config.js';
import type { MetricValue, MetricsOptionsInput, ObjectiveMetric, PerformanceMetrics } from '../metrics/types.js';
import type { Strategy } from '../strategies/types.js';

/**
 * Metric key, or a function scoring a run's metrics
 */
export type Objective = ObjectiveMetric | ((metrics: PerformanceMetrics) => MetricValue);

/**
 * Slice of a grid: combinations whose position modulo `count` equals `index`
 */
export interface GridShard {
  index: number;
  count: number;
}

export interface GridPoint {
  /** Position in the full grid */
  readonly index: number;
  readonly params: ParameterSet;
}

export interface OptimizeOptions {
  series: PriceSeries;
  strategy: Strategy;
  grid: ParameterGrid;
  config?: SimulationConfigInput;
  /** Default: sharpeRatio */
  objective?: Objective;
  metricsOptions?: MetricsOptionsInput;
  /** Stop after this many combinations, completed or skipped */
  maxCombinations?: number;
  shard?: GridShard;
  /** Halts the sweep between combinations */
  signal?: AbortSignal;
  /** Log progress every N combinations; default 100 */
  progressInterval?: number;
}

export interface CompletedEntry {
  readonly status: 'completed';
  readonly index: number;
  readonly params: ParameterSet;
  readonly result: BacktestResult;
  readonly metrics: PerformanceMetrics;
  readonly score: MetricValue;
}

export interface SkipReason {
  readonly code: BacktestErrorCode;
  readonly message: string;
  readonly context: Record<string, unknown>;
}

export interface SkippedEntry {
  readonly status: 'skipped';
  readonly index: number;
  readonly params: ParameterSet;
  readonly reason: SkipReason;
}

export type SweepEntry = CompletedEntry | SkippedEntry;

export interface SweepRanking {
  /** Best completed entries, best first */
  readonly ranked: readonly CompletedEntry[];
  readonly skipped: readonly SkippedEntry[];
  /** Completed entries seen, including ones beyond the ranking limit */
  readonly completed: number;
  readonly totalCombinations: number;
}

export interface SweepSummary {
  readonly totalCombinations: number;
  readonly completed: number;
  readonly skipped: number;
  readonly skipReasons: Readonly<Partial<Record<BacktestErrorCode, number>>>;
  readonly best: CompletedEntry | null;
}
