export * from './types.js';
export * from './grid.js';
export * from './optimizer.js';
export * from './ranking.js';
