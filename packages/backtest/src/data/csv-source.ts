/**
 * CSV Bar Source
 * ==============
 * Reads `<dir>/<SYMBOL>_<interval>.csv` files with a
 * `date,open,high,low,close,volume` header. Dates are ISO 8601 (UTC unless an
 * offset is given) or UNIX seconds.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { DataIntegrityError, InvalidParameterError } from '@tradelab/core';
import type { Bar, BarInterval, PriceSeries } from '@tradelab/core';
import { logger } from '../logger.js';
import { createPriceSeries } from '../series/price-series.js';
import type { BarRequest, BarSource } from './provider.js';

const CsvRowSchema = z.object({
  date: z.string().min(1),
  open: z.coerce.number(),
  high: z.coerce.number(),
  low: z.coerce.number(),
  close: z.coerce.number(),
  volume: z.coerce.number(),
});

const UNIX_SECONDS = /^\d+(\.\d+)?$/;

/**
 * Parse a date cell to UNIX seconds, or null when it is not a valid date
 */
export function parseBarTimestamp(value: string): number | null {
  if (UNIX_SECONDS.test(value)) {
    return Number(value);
  }
  const parsed = DateTime.fromISO(value, { zone: 'utc' });
  return parsed.isValid ? parsed.toSeconds() : null;
}

/**
 * Parse CSV text into bars, in file order
 *
 * @throws DataIntegrityError for a malformed row or date
 */
export function parseBarsCsv(content: string, context: Record<string, unknown> = {}): Bar[] {
  const records: unknown = parse(content, { columns: true, skip_empty_lines: true, trim: true });
  if (!Array.isArray(records)) {
    throw new DataIntegrityError('CSV content did not parse into rows', 'malformed_row', context);
  }

  return records.map((record: unknown, row) => {
    const parsed = CsvRowSchema.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new DataIntegrityError(
        `Row ${row + 1}: '${issue.path.join('.')}' ${issue.message}`,
        'malformed_row',
        { ...context, row: row + 1 }
      );
    }
    const { date, open, high, low, close, volume } = parsed.data;
    const timestamp = parseBarTimestamp(date);
    if (timestamp === null) {
      throw new DataIntegrityError(`Row ${row + 1}: invalid date '${date}'`, 'invalid_timestamp', {
        ...context,
        row: row + 1,
      });
    }
    return { timestamp, open, high, low, close, volume };
  });
}

export interface CsvBarSourceOptions {
  /** Directory holding the CSV files */
  dir: string;
}

export class CsvBarSource implements BarSource {
  readonly name = 'csv';
  private readonly dir: string;

  constructor(options: CsvBarSourceOptions) {
    this.dir = options.dir;
  }

  filePath(symbol: string, interval: BarInterval): string {
    return path.join(this.dir, `${symbol.toUpperCase()}_${interval}.csv`);
  }

  async fetchBars(request: BarRequest): Promise<PriceSeries> {
    const { symbol, interval } = request;
    const filePath = this.filePath(symbol, interval);

    if (!fs.existsSync(filePath)) {
      throw new InvalidParameterError(`No bar data for ${symbol} ${interval}`, 'symbol', {
        value: symbol,
        interval,
        path: filePath,
      });
    }

    const content = await fs.promises.readFile(filePath, 'utf-8');
    const bars = parseBarsCsv(content, { symbol, interval, path: filePath });

    const start = request.start?.toSeconds() ?? -Infinity;
    const end = request.end?.toSeconds() ?? Infinity;
    const inRange = bars.filter((bar) => bar.timestamp >= start && bar.timestamp <= end);

    logger.debug('Loaded bars from CSV', { symbol, interval, rows: bars.length, bars: inRange.length });

    return createPriceSeries(symbol, interval, inRange);
  }
}
