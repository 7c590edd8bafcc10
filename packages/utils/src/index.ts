/**
 * @tradelab/utils - Shared utilities package
 *
 * Logger utilities and configuration loading. Domain types and errors live in
 * @tradelab/core.
 */

// Logger and logging utilities
export { logger, Logger } from './logger.js';
export type { LogContext } from './logger.js';

// Package-aware logging
export { createPackageLogger, LogHelpers } from './logging/index.js';

// Configuration loading
export * from './config/index.js';
export { loadConfigFromYaml, getConfigSection, clearConfigCache } from './config/yaml-config.js';
export type { AppConfig } from './config/yaml-config.js';
