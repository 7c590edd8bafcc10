/**
 * Sink Base Types
 * ===============
 * Base types for backtest report sinks.
 */

import * as path from 'path';
import type { BacktestReport } from '../engine/simulator.js';

/**
 * Result sink interface
 */
export interface ResultSink {
  /** Sink name */
  readonly name: string;

  /**
   * Handle a backtest report
   */
  handle(report: BacktestReport): Promise<void>;
}

/**
 * Sink options base
 */
export interface BaseSinkOptions {
  /** Output directory; relative paths resolve from the working directory */
  dir: string;
}

export function resolveOutputDir(dir: string): string {
  return path.isAbsolute(dir) ? dir : path.join(process.cwd(), dir);
}
