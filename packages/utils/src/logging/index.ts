/**
 * Centralized Logging System
 * ==========================
 * Package-aware logging with namespaces.
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@tradelab/utils';
 *
 * const logger = createPackageLogger('@tradelab/backtest');
 * logger.info('Sweep started', { combinations: 120 });
 * ```
 */

import { Logger } from '../logger.js';
import type { LogContext } from '../logger.js';

/**
 * Package logger registry
 */
const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = new Logger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Structured log utilities for common operations
 */
export class LogHelpers {
  /**
   * Log cache hit/miss
   */
  static cache(
    logger: Logger,
    operation: 'hit' | 'miss' | 'set' | 'delete' | 'expired',
    key: string,
    context?: LogContext
  ): void {
    logger.debug(`Cache ${operation}`, { key, ...context });
  }
}
