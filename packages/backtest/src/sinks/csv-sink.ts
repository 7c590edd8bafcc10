/**
 * CSV Sink
 * ========
 * Writes `trades.csv`, `equity.csv` and `summary.csv` under `<dir>/<runId>/`.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { BacktestReport } from '../engine/simulator.js';
import { logger } from '../logger.js';
import type { BaseSinkOptions, ResultSink } from './base.js';
import { resolveOutputDir } from './base.js';
import { equityCurveToCsv, summaryToCsv, toSummaryRecord, tradesToCsv } from './export.js';

export type CsvSinkOptions = BaseSinkOptions;

export class CsvSink implements ResultSink {
  readonly name = 'csv';
  private readonly dir: string;

  constructor(options: CsvSinkOptions) {
    this.dir = resolveOutputDir(options.dir);
  }

  runDir(runId: string): string {
    return path.join(this.dir, runId);
  }

  async handle(report: BacktestReport): Promise<void> {
    const { result } = report;
    const runDir = this.runDir(result.runId);
    await fs.mkdir(runDir, { recursive: true });

    await fs.writeFile(path.join(runDir, 'trades.csv'), tradesToCsv(result.trades), 'utf-8');
    await fs.writeFile(path.join(runDir, 'equity.csv'), equityCurveToCsv(result.equityCurve), 'utf-8');
    await fs.writeFile(path.join(runDir, 'summary.csv'), summaryToCsv(toSummaryRecord(report)), 'utf-8');

    logger.debug('Wrote CSV report', { runId: result.runId, dir: runDir });
  }
}
