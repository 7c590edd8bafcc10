/**
 * Strategy Types
 *
 * A strategy is a named signal function over a trailing bar window, with a
 * zod schema for its parameters. Strategies hold no state between calls.
 */

import type { z } from 'zod';
import type { Bar, ParameterSet, Signal } from '@tradelab/core';
import { parseOrThrow } from '../validation.js';

/**
 * A strategy bound to validated parameters
 */
export interface PreparedStrategy {
  readonly strategy: string;
  /** Resolved parameters, defaults applied */
  readonly parameters: ParameterSet;
  /** Minimum number of bars before the first signal */
  readonly lookback: number;
  signal(window: readonly Bar[]): Signal;
}

export interface Strategy {
  readonly name: string;
  readonly description: string;
  readonly defaults: ParameterSet;
  /**
   * Validate parameters and bind them
   * @throws InvalidParameterError
   */
  prepare(params?: ParameterSet): PreparedStrategy;
}

export interface StrategyDefinition<P extends ParameterSet> {
  name: string;
  description: string;
  /** Parameter schema; every field needs a default */
  schema: z.ZodType<P, z.ZodTypeDef, unknown>;
  lookback(params: P): number;
  signal(window: readonly Bar[], params: P): Signal;
}

export const HOLD: Signal = Object.freeze({ action: 'hold' });

/**
 * Build a Strategy from a parameter schema and a signal function
 */
export function defineStrategy<P extends ParameterSet>(definition: StrategyDefinition<P>): Strategy {
  const { name, description, schema } = definition;

  const parse = (params: ParameterSet): P =>
    parseOrThrow(schema, params, `Invalid parameters for strategy '${name}'`, { strategy: name });

  const defaults = Object.freeze(parse({}));

  return Object.freeze({
    name,
    description,
    defaults,
    prepare(params: ParameterSet = {}): PreparedStrategy {
      const parameters = Object.freeze(parse(params));
      return Object.freeze({
        strategy: name,
        parameters,
        lookback: definition.lookback(parameters),
        signal: (window: readonly Bar[]) => definition.signal(window, parameters),
      });
    },
  });
}
