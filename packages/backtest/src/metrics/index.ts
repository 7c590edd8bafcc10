export * from './types.js';
export * from './returns.js';
export * from './drawdown.js';
export * from './risk.js';
export * from './trade-stats.js';
export * from './metrics-engine.js';
