export * from './types.js';
export * from './registry.js';
export * from './crossover.js';
export * from './oscillators.js';
export * from './bands.js';
export { REFERENCE_STRATEGIES } from './reference.js';
