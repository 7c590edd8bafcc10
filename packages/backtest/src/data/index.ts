export * from './provider.js';
export * from './bar-cache.js';
export * from './cached-source.js';
export * from './csv-source.js';
