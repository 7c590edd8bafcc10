/**
 * @tradelab/core
 *
 * Domain types, error taxonomy and parameter hashing shared by every package.
 */

export * from './domain/index.js';
export * from './errors.js';
export * from './parameter-hash.js';
