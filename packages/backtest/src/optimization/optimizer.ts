/**
 * Parameter Sweep
 * ===============
 * Runs one backtest per grid combination and yields each outcome as it
 * finishes. Combinations that fail with a skippable error are reported and
 * the sweep moves on; anything else ends the sweep.
 */

import { InvalidParameterError, isSkippableError } from '@tradelab/core';
import { validateSimulationConfig } from '../config.js';
import { logger } from '../logger.js';
import { computeMetrics, validateMetricsOptions } from '../metrics/metrics-engine.js';
import { OBJECTIVE_METRICS, normalizeMetric } from '../metrics/types.js';
import type { MetricValue, ObjectiveMetric, PerformanceMetrics } from '../metrics/types.js';
import { simulate } from '../engine/simulator.js';
import { assertBarIntegrity } from '../series/price-series.js';
import { countCombinations, gridPoints } from './grid.js';
import type { GridPoint, Objective, OptimizeOptions, SweepEntry } from './types.js';

const DEFAULT_PROGRESS_INTERVAL = 100;

function isObjectiveMetric(value: string): value is ObjectiveMetric {
  return OBJECTIVE_METRICS.some((metric) => metric === value);
}

/**
 * Turn an objective into a scoring function
 *
 * @throws InvalidParameterError for an unknown metric key
 */
export function resolveObjective(objective: Objective = 'sharpeRatio'): (metrics: PerformanceMetrics) => MetricValue {
  if (typeof objective === 'function') {
    return (metrics) => normalizeMetric(objective(metrics));
  }
  if (!isObjectiveMetric(objective)) {
    throw new InvalidParameterError(
      `Unknown objective: ${String(objective)}. Available: ${OBJECTIVE_METRICS.join(', ')}`,
      'objective',
      { value: objective }
    );
  }
  return (metrics) => metrics[objective];
}

function validatePositiveInteger(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new InvalidParameterError(`${name} must be a positive integer`, name, { value });
  }
}

/**
 * Sweep a strategy over a parameter grid
 *
 * Inputs are validated and the series integrity is checked before the first
 * combination runs, so those errors are thrown from this call.
 *
 * @throws DataIntegrityError, InvalidParameterError
 */
export function optimize(options: OptimizeOptions): Generator<SweepEntry> {
  const { series, strategy, grid } = options;
  const config = validateSimulationConfig(options.config ?? {});
  const metricsOptions = validateMetricsOptions(options.metricsOptions ?? {});
  const score = resolveObjective(options.objective);
  validatePositiveInteger('maxCombinations', options.maxCombinations);
  validatePositiveInteger('progressInterval', options.progressInterval);
  assertBarIntegrity(series.bars, { symbol: series.symbol, interval: series.interval });

  const points = gridPoints(grid, { shard: options.shard });
  const shard = options.shard ?? { index: 0, count: 1 };
  const gridSize = countCombinations(grid);
  const inShard = Math.max(0, Math.ceil((gridSize - shard.index) / shard.count));
  const total = Math.min(inShard, options.maxCombinations ?? inShard);

  const sweepLogger = logger.child({ strategy: strategy.name, symbol: series.symbol, interval: series.interval });

  function runPoint({ index, params }: GridPoint): SweepEntry {
    try {
      const prepared = strategy.prepare(params);
      const result = simulate(series, prepared, config);
      const metrics = computeMetrics(result, metricsOptions);
      return { status: 'completed', index, params, result, metrics, score: score(metrics) };
    } catch (error) {
      if (!isSkippableError(error)) {
        throw error;
      }
      sweepLogger.warn('Combination skipped', { index, params, code: error.code, reason: error.message });
      return {
        status: 'skipped',
        index,
        params,
        reason: { code: error.code, message: error.message, context: error.context },
      };
    }
  }

  function* sweep(): Generator<SweepEntry> {
    const progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
    let completed = 0;
    let skipped = 0;

    sweepLogger.info('Sweep started', { total, gridSize, shard });

    for (const point of points) {
      if (completed + skipped >= total) break;
      if (options.signal?.aborted) {
        sweepLogger.info('Sweep aborted', { completed, skipped, total });
        return;
      }

      const entry = runPoint(point);
      if (entry.status === 'completed') completed++;
      else skipped++;

      const processed = completed + skipped;
      if (processed % progressInterval === 0 && processed < total) {
        sweepLogger.info('Sweep progress', { completed, skipped, total });
      }

      yield entry;
    }

    sweepLogger.info('Sweep completed', { completed, skipped, total });
  }

  return sweep();
}

