/**
 * Strategy Registry
 *
 * Name-keyed lookup of strategies. Registration is explicit; there is no
 * discovery by scanning modules.
 */

import { InvalidParameterError } from '@tradelab/core';
import type { Strategy } from './types.js';
import { REFERENCE_STRATEGIES } from './reference.js';

export interface StrategyInfo {
  name: string;
  description: string;
}

export class StrategyRegistry {
  private strategies = new Map<string, Strategy>();

  /**
   * Register a strategy
   *
   * @throws Error if a strategy with the same name already exists
   */
  register(strategy: Strategy): this {
    if (this.strategies.has(strategy.name)) {
      throw new Error(`Strategy '${strategy.name}' is already registered`);
    }
    this.strategies.set(strategy.name, strategy);
    return this;
  }

  get(name: string): Strategy | undefined {
    return this.strategies.get(name);
  }

  has(name: string): boolean {
    return this.strategies.has(name);
  }

  /**
   * Get a strategy by name
   *
   * @throws InvalidParameterError listing the available names
   */
  resolve(name: string): Strategy {
    const strategy = this.strategies.get(name);
    if (!strategy) {
      const available = this.names();
      throw new InvalidParameterError(
        `Unknown strategy: ${name}. Available: ${available.join(', ')}`,
        'strategy',
        { value: name, available }
      );
    }
    return strategy;
  }

  names(): string[] {
    return Array.from(this.strategies.keys());
  }

  list(): StrategyInfo[] {
    return Array.from(this.strategies.values(), ({ name, description }) => ({ name, description }));
  }
}

/**
 * Registry holding the reference strategies
 */
export function createStrategyRegistry(): StrategyRegistry {
  const registry = new StrategyRegistry();
  for (const strategy of REFERENCE_STRATEGIES) {
    registry.register(strategy);
  }
  return registry;
}
