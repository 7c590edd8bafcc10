/**
 * JSON Sink
 * =========
 * Writes one `<runId>.json` document per report.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { BacktestReport } from '../engine/simulator.js';
import { logger } from '../logger.js';
import { drawdownSeries } from '../metrics/drawdown.js';
import type { BaseSinkOptions, ResultSink } from './base.js';
import { resolveOutputDir } from './base.js';
import { toIsoTimestamp, toSummaryRecord } from './export.js';

export interface JsonSinkOptions extends BaseSinkOptions {
  /** Pretty print JSON; default true */
  pretty?: boolean;
}

export class JsonSink implements ResultSink {
  readonly name = 'json';
  private readonly dir: string;
  private readonly pretty: boolean;

  constructor(options: JsonSinkOptions) {
    this.dir = resolveOutputDir(options.dir);
    this.pretty = options.pretty ?? true;
  }

  filePath(runId: string): string {
    return path.join(this.dir, `${runId}.json`);
  }

  async handle(report: BacktestReport): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });

    const payload = this.formatPayload(report);
    const data = JSON.stringify(payload, null, this.pretty ? 2 : undefined);
    const filePath = this.filePath(report.result.runId);
    await fs.writeFile(filePath, data + '\n', 'utf-8');

    logger.debug('Wrote JSON report', { runId: report.result.runId, path: filePath });
  }

  private formatPayload(report: BacktestReport): Record<string, unknown> {
    const { result } = report;
    return {
      summary: toSummaryRecord(report),
      config: result.config,
      trades: result.trades.map((trade) => ({
        ...trade,
        entryTime: toIsoTimestamp(trade.entryTimestamp),
        exitTime: toIsoTimestamp(trade.exitTimestamp),
      })),
      equityCurve: drawdownSeries(result.equityCurve).map((point) => ({
        ...point,
        time: toIsoTimestamp(point.timestamp),
      })),
    };
  }
}
