/**
 * End-to-end: CSV bars through the cache, a sweep, ranking and the JSON sink
 */

import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DateTime } from 'luxon';
import { BarCache } from '../../src/data/bar-cache.js';
import { CachedBarSource } from '../../src/data/cached-source.js';
import { CsvBarSource } from '../../src/data/csv-source.js';
import { runBacktestReport } from '../../src/engine/simulator.js';
import { optimize } from '../../src/optimization/optimizer.js';
import { rankSweep, summarizeSweep } from '../../src/optimization/ranking.js';
import { JsonSink } from '../../src/sinks/json-sink.js';
import { createStrategyRegistry } from '../../src/strategies/registry.js';

describe('backtest pipeline', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-'));
    const start = DateTime.fromISO('2023-01-01', { zone: 'utc' });
    const rows = Array.from({ length: 200 }, (_, i) => {
      const close = 100 + 15 * Math.sin(i / 8) + i * 0.05;
      const date = start.plus({ days: i }).toISODate();
      return `${date},${close},${close + 1},${close - 1},${close},${1000 + i}`;
    });
    fs.writeFileSync(path.join(dir, 'DEMO_1d.csv'), ['date,open,high,low,close,volume', ...rows].join('\n'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads, sweeps, ranks and writes the best run', async () => {
    const upstream = new CsvBarSource({ dir });
    const source = new CachedBarSource(upstream, new BarCache());
    const series = await source.fetchBars({ symbol: 'DEMO', interval: '1d' });
    expect(series.bars).toHaveLength(200);
    await expect(source.fetchBars({ symbol: 'DEMO', interval: '1d' })).resolves.toBe(series);

    const strategy = createStrategyRegistry().resolve('sma_crossover');
    const ranking = rankSweep(
      optimize({
        series,
        strategy,
        grid: { fastPeriod: [5, 10, 60], slowPeriod: [20, 40] },
        objective: 'totalReturn',
        config: { stopLossPct: 0.05 },
      }),
      { limit: 3 }
    );
    const summary = summarizeSweep(ranking);

    expect(summary).toMatchObject({ totalCombinations: 6, completed: 4, skipped: 2, skipReasons: { INVALID_PARAMETER: 2 } });
    expect(ranking.ranked).toHaveLength(3);

    const best = summary.best;
    expect(best).not.toBeNull();
    if (!best) return;

    const rerun = runBacktestReport({ series, strategy, params: best.params, config: { stopLossPct: 0.05 } });
    expect(rerun.result.runId).toBe(best.result.runId);
    expect(rerun.metrics.totalReturn).toBe(best.score);

    const sink = new JsonSink({ dir: path.join(dir, 'out') });
    await sink.handle(rerun);
    expect(fs.existsSync(sink.filePath(best.result.runId))).toBe(true);
  });
});
