/**
 * Simulation configuration
 * ========================
 * zod schema for SimulationConfig plus layered resolution:
 * defaults <- tradelab.yaml `backtest:` <- BACKTEST_* env <- explicit overrides.
 */

import { z } from 'zod';
import type { SimulationConfig } from '@tradelab/core';
import { getBacktestEnvOverrides, getConfigSection } from '@tradelab/utils';
import type { BacktestEnvOverrides } from '@tradelab/utils';
import { MetricsOptionsSchema } from './metrics/types.js';
import type { MetricsOptions } from './metrics/types.js';
import { parseOrThrow } from './validation.js';

export const ExitPrioritySchema = z.enum(['stop_loss_first', 'take_profit_first']);

export const SimulationConfigSchema = z
  .object({
    initialCapital: z.number().finite().positive().default(10_000),
    commissionRate: z.number().min(0).lt(1).default(0.001),
    slippageRate: z.number().min(0).lt(1).default(0.0005),
    maxPositionFraction: z.number().gt(0).max(1).default(0.95),
    stopLossPct: z.number().gt(0).lt(1).optional(),
    takeProfitPct: z.number().finite().gt(0).optional(),
    exitPriority: ExitPrioritySchema.default('stop_loss_first'),
  })
  .strict();

export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = Object.freeze(SimulationConfigSchema.parse({}));

const SIMULATION_CONFIG_KEYS = Object.keys(SimulationConfigSchema.shape);
const METRICS_OPTION_KEYS = Object.keys(MetricsOptionsSchema.shape);

/**
 * Validate a simulation config, applying defaults
 */
export function validateSimulationConfig(input: unknown = {}): SimulationConfig {
  return Object.freeze(parseOrThrow(SimulationConfigSchema, input, 'Invalid simulation config'));
}

/**
 * Configuration layers below explicit overrides
 */
export interface ConfigSources {
  /** `backtest:` section of tradelab.yaml */
  backtest?: Record<string, unknown>;
  /** `metrics:` section of tradelab.yaml */
  metrics?: Record<string, unknown>;
  env?: BacktestEnvOverrides;
}

function pickKnown(source: object | undefined, keys: readonly string[]): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  if (!source) {
    return picked;
  }
  for (const [key, value] of Object.entries(source)) {
    if (keys.includes(key) && value !== undefined) {
      picked[key] = value;
    }
  }
  return picked;
}

function loadSources(sources?: ConfigSources): Required<ConfigSources> {
  return {
    backtest: sources?.backtest ?? getConfigSection('backtest'),
    metrics: sources?.metrics ?? getConfigSection('metrics'),
    env: sources?.env ?? getBacktestEnvOverrides(),
  };
}

/**
 * Resolve the simulation config from every layer
 */
export function resolveSimulationConfig(
  overrides: SimulationConfigInput = {},
  sources?: ConfigSources
): SimulationConfig {
  const layers = loadSources(sources);
  return validateSimulationConfig({
    ...pickKnown(layers.backtest, SIMULATION_CONFIG_KEYS),
    ...pickKnown(layers.env, SIMULATION_CONFIG_KEYS),
    ...overrides,
  });
}

/**
 * Resolve metrics options from every layer
 */
export function resolveMetricsOptions(
  overrides: z.input<typeof MetricsOptionsSchema> = {},
  sources?: ConfigSources
): MetricsOptions {
  const layers = loadSources(sources);
  return parseOrThrow(
    MetricsOptionsSchema,
    {
      ...pickKnown(layers.metrics, METRICS_OPTION_KEYS),
      ...pickKnown(layers.env, METRICS_OPTION_KEYS),
      ...overrides,
    },
    'Invalid metrics options'
  );
}
