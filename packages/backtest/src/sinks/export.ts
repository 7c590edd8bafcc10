/**
 * Export Formats
 * ==============
 * Stable flat and CSV shapes for reports, trades and equity curves.
 * Timestamps are written as ISO 8601 in UTC.
 */

import { DateTime } from 'luxon';
import { EXIT_REASONS, canonicalize } from '@tradelab/core';
import type { EquityPoint, Trade } from '@tradelab/core';
import type { BacktestReport } from '../engine/simulator.js';
import { drawdownSeries } from '../metrics/drawdown.js';

export type SummaryValue = string | number;

export function toIsoTimestamp(seconds: number): string {
  return DateTime.fromSeconds(seconds, { zone: 'utc' }).toISO() ?? String(seconds);
}

/**
 * Quote a CSV cell when it holds a delimiter, quote or newline
 */
export function csvCell(value: SummaryValue): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvLines(header: readonly string[], rows: readonly (readonly SummaryValue[])[]): string {
  return [header, ...rows].map((row) => row.map(csvCell).join(',')).join('\n') + '\n';
}

/**
 * Flat record of run identity and every metric. Exit reason counts are
 * keyed `exitReasons.<reason>`; sentinel metrics keep their sentinel string.
 */
export function toSummaryRecord(report: BacktestReport): Record<string, SummaryValue> {
  const { result, metrics } = report;
  const record: Record<string, SummaryValue> = {
    runId: result.runId,
    strategy: result.strategy,
    symbol: result.symbol,
    interval: result.interval,
    periodStart: toIsoTimestamp(result.period.start),
    periodEnd: toIsoTimestamp(result.period.end),
    parameters: canonicalize(result.parameters),
    initialCapital: result.initialCapital,
    finalEquity: result.finalEquity,
  };

  const { exitReasons, ...scalars } = metrics;
  for (const [key, value] of Object.entries(scalars)) {
    record[key] = value;
  }
  for (const reason of EXIT_REASONS) {
    record[`exitReasons.${reason}`] = exitReasons[reason];
  }

  return record;
}

export const TRADE_CSV_HEADER = [
  'entry_time',
  'exit_time',
  'direction',
  'entry_price',
  'exit_price',
  'size',
  'gross_pnl',
  'commission',
  'slippage_cost',
  'net_pnl',
  'return_pct',
  'bars_held',
  'exit_reason',
] as const;

export function tradesToCsv(trades: readonly Trade[]): string {
  return csvLines(
    TRADE_CSV_HEADER,
    trades.map((trade) => [
      toIsoTimestamp(trade.entryTimestamp),
      toIsoTimestamp(trade.exitTimestamp),
      trade.direction,
      trade.entryPrice,
      trade.exitPrice,
      trade.size,
      trade.grossPnl,
      trade.commission,
      trade.slippageCost,
      trade.netPnl,
      trade.returnPct,
      trade.barsHeld,
      trade.exitReason,
    ])
  );
}

export function equityCurveToCsv(curve: readonly EquityPoint[]): string {
  return csvLines(
    ['timestamp', 'equity', 'drawdown'],
    drawdownSeries(curve).map((point) => [toIsoTimestamp(point.timestamp), point.equity, point.drawdown])
  );
}

export function summaryToCsv(record: Record<string, SummaryValue>): string {
  return csvLines(Object.keys(record), [Object.values(record)]);
}
