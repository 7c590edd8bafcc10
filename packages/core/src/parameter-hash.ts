/**
 * Parameter hashing and schemas
 *
 * Deterministic hashes give every backtest run a stable id, so identical
 * inputs map to the same run across processes.
 */

import { createHash } from 'crypto';
import { z } from 'zod';

export const ParamValueSchema = z.union([z.number().finite(), z.string(), z.boolean()]);

export const ParameterSetSchema = z.record(ParamValueSchema);

export const ParameterGridSchema = z.record(
  z.array(ParamValueSchema).nonempty({ message: 'each grid parameter needs at least one value' })
);

/**
 * Serialize a value with object keys sorted at every depth
 */
export function canonicalize(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalize(item)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Compute parameter vector hash
 */
export function computeParameterHash(parameters: unknown): string {
  return createHash('sha256').update(canonicalize(parameters)).digest('hex');
}
