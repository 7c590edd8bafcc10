/**
 * Parameter Grid Generation
 *
 * Lazy cartesian product over a parameter grid. Keys keep insertion order and
 * the last key varies fastest.
 */

import { InvalidParameterError, ParameterGridSchema } from '@tradelab/core';
import type { ParameterGrid, ParameterSet, ParamValue } from '@tradelab/core';
import { parseOrThrow } from '../validation.js';
import type { GridPoint, GridShard } from './types.js';

/**
 * Validate a grid: every key needs a non-empty list of scalar values
 */
export function validateGrid(grid: ParameterGrid): void {
  parseOrThrow(ParameterGridSchema, grid, 'Invalid parameter grid');
}

function validateShard(shard: GridShard): void {
  if (!Number.isInteger(shard.count) || shard.count < 1) {
    throw new InvalidParameterError('shard count must be a positive integer', 'shard.count', { value: shard.count });
  }
  if (!Number.isInteger(shard.index) || shard.index < 0 || shard.index >= shard.count) {
    throw new InvalidParameterError(`shard index must be in [0, ${shard.count})`, 'shard.index', {
      value: shard.index,
    });
  }
}

/**
 * Number of combinations in the full grid
 */
export function countCombinations(grid: ParameterGrid): number {
  validateGrid(grid);
  return Object.values(grid).reduce((product, values) => product * values.length, 1);
}

function* enumerate(
  keys: readonly string[],
  values: readonly (readonly ParamValue[])[],
  shard: GridShard
): Generator<GridPoint> {
  const total = values.reduce((product, list) => product * list.length, 1);

  for (let index = shard.index; index < total; index += shard.count) {
    // Decode the mixed-radix position, last key fastest
    const params: Record<string, ParamValue> = {};
    let remainder = index;
    for (let k = keys.length - 1; k >= 0; k--) {
      const list = values[k];
      params[keys[k]] = list[remainder % list.length];
      remainder = Math.floor(remainder / list.length);
    }
    // Restore key insertion order
    const ordered: Record<string, ParamValue> = {};
    for (const key of keys) {
      ordered[key] = params[key];
    }
    yield { index, params: Object.freeze(ordered) };
  }
}

/**
 * Grid combinations with their position in the full grid
 *
 * @throws InvalidParameterError for an empty value list or a bad shard
 */
export function gridPoints(grid: ParameterGrid, options: { shard?: GridShard } = {}): Generator<GridPoint> {
  validateGrid(grid);
  const shard = options.shard ?? { index: 0, count: 1 };
  validateShard(shard);

  const keys = Object.keys(grid);
  return enumerate(
    keys,
    keys.map((key) => grid[key]),
    shard
  );
}

/**
 * Lazy cartesian product of the grid
 */
export function* gridCombinations(
  grid: ParameterGrid,
  options: { shard?: GridShard } = {}
): Generator<ParameterSet> {
  for (const point of gridPoints(grid, options)) {
    yield point.params;
  }
}
