/**
 * Domain Module
 *
 * Core domain types organized by domain area.
 */

// Market data domain
export * from './market/index.js';

// Trading domain
export * from './trading/index.js';

// Backtest domain
export * from './backtest/index.js';
