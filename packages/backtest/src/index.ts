/**
 * @tradelab/backtest
 *
 * Bar-by-bar simulation, performance metrics and parameter sweeps.
 */

export * from './config.js';
export * from './series/price-series.js';
export * as indicators from './indicators/series.js';
export * from './strategies/index.js';
export * from './execution/costs.js';
export * from './position/position.js';
export * from './engine/index.js';
export * from './metrics/index.js';
export * from './optimization/index.js';
export * from './data/index.js';
export * from './sinks/index.js';
