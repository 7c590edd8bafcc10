import { describe, it, expect } from 'vitest';
import { InvalidParameterError } from '@tradelab/core';
import {
  DEFAULT_SIMULATION_CONFIG,
  resolveMetricsOptions,
  resolveSimulationConfig,
  validateSimulationConfig,
} from '../../src/config.js';

const empty = { backtest: {}, metrics: {}, env: {} };

describe('validateSimulationConfig', () => {
  it('applies defaults', () => {
    expect(DEFAULT_SIMULATION_CONFIG).toEqual({
      initialCapital: 10_000,
      commissionRate: 0.001,
      slippageRate: 0.0005,
      maxPositionFraction: 0.95,
      exitPriority: 'stop_loss_first',
    });
    expect(Object.isFrozen(validateSimulationConfig({}))).toBe(true);
  });

  it('names the offending key', () => {
    expect(() => validateSimulationConfig({ foo: 1 })).toThrow(
      "Invalid simulation config: 'foo' Unrecognized key(s) in object: 'foo'"
    );
    expect(() => validateSimulationConfig({ stopLossPct: 1.5 })).toThrow(InvalidParameterError);
    expect(() => validateSimulationConfig({ initialCapital: -1 })).toThrow(InvalidParameterError);
  });
});

describe('resolveSimulationConfig', () => {
  it('layers file, environment and overrides', () => {
    const config = resolveSimulationConfig(
      { initialCapital: 5_000 },
      {
        ...empty,
        backtest: { commissionRate: 0.002, slippageRate: 0.001, initialCapital: 1, comment: 'ignored' },
        env: { slippageRate: 0.003 },
      }
    );

    expect(config).toEqual({
      initialCapital: 5_000,
      commissionRate: 0.002,
      slippageRate: 0.003,
      maxPositionFraction: 0.95,
      exitPriority: 'stop_loss_first',
    });
  });

  it('validates an exit priority from the environment', () => {
    expect(resolveSimulationConfig({}, { ...empty, env: { exitPriority: 'take_profit_first' } }).exitPriority).toBe(
      'take_profit_first'
    );
    expect(() => resolveSimulationConfig({}, { ...empty, env: { exitPriority: 'sideways' } })).toThrow(
      InvalidParameterError
    );
  });
});

describe('resolveMetricsOptions', () => {
  it('layers file, environment and overrides', () => {
    expect(
      resolveMetricsOptions({ periodsPerYear: 365 }, { ...empty, metrics: { riskFreeRate: 0 }, env: { confidenceLevel: 0.99 } })
    ).toEqual({ periodsPerYear: 365, riskFreeRate: 0, confidenceLevel: 0.99 });
  });
});
