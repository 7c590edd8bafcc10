export * from './base.js';
export * from './export.js';
export * from './csv-sink.js';
export * from './json-sink.js';
