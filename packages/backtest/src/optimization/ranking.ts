/**
 * Sweep Ranking
 *
 * Orders completed runs by score: 'infinite' first, then numbers descending,
 * then 'undefined'. Equal scores keep grid order.
 */

import type { BacktestErrorCode } from '@tradelab/core';
import { normalizeMetric } from '../metrics/types.js';
import type { MetricValue } from '../metrics/types.js';
import type { CompletedEntry, SkippedEntry, SweepEntry, SweepRanking, SweepSummary } from './types.js';

// NaN and infinite numbers rank with their sentinels
function scoreRank(value: MetricValue): number {
  const normalized = normalizeMetric(value);
  if (normalized === 'infinite') return 2;
  if (normalized === 'undefined') return 0;
  return 1;
}

/**
 * Positive when `a` scores better than `b`
 */
export function compareScores(a: MetricValue, b: MetricValue): number {
  const rankDiff = scoreRank(a) - scoreRank(b);
  if (rankDiff !== 0) return rankDiff;
  if (scoreRank(a) === 1 && typeof a === 'number' && typeof b === 'number') return a - b;
  return 0;
}

/**
 * Sort order for completed entries, best first
 */
export function compareEntries(a: CompletedEntry, b: CompletedEntry): number {
  return compareScores(b.score, a.score) || a.index - b.index;
}

/**
 * Keeps the best `limit` entries in order. Without a limit entries are
 * buffered and sorted once on `result()`.
 */
class RankedBuffer {
  private readonly entries: CompletedEntry[] = [];

  constructor(private readonly limit: number | undefined) {}

  add(entry: CompletedEntry): void {
    if (this.limit === undefined) {
      this.entries.push(entry);
      return;
    }
    let position = this.entries.length;
    while (position > 0 && compareEntries(entry, this.entries[position - 1]) < 0) {
      position--;
    }
    if (position >= this.limit) return;
    this.entries.splice(position, 0, entry);
    if (this.entries.length > this.limit) {
      this.entries.pop();
    }
  }

  result(): CompletedEntry[] {
    return this.limit === undefined ? this.entries.sort(compareEntries) : this.entries;
  }
}

export interface RankOptions {
  /** Keep only the best N completed entries */
  limit?: number;
}

/**
 * Consume a sweep and keep the best entries
 */
export function rankSweep(entries: Iterable<SweepEntry>, options: RankOptions = {}): SweepRanking {
  const ranked = new RankedBuffer(options.limit);
  const skipped: SkippedEntry[] = [];
  let completed = 0;

  for (const entry of entries) {
    if (entry.status === 'skipped') {
      skipped.push(entry);
      continue;
    }
    completed++;
    ranked.add(entry);
  }

  return {
    ranked: ranked.result(),
    skipped,
    completed,
    totalCombinations: completed + skipped.length,
  };
}

/**
 * Combine rankings from sweeps over disjoint shards of one grid
 */
export function mergeRankings(rankings: readonly SweepRanking[], options: RankOptions = {}): SweepRanking {
  const ranked = new RankedBuffer(options.limit);
  for (const ranking of rankings) {
    for (const entry of ranking.ranked) {
      ranked.add(entry);
    }
  }

  return {
    ranked: ranked.result(),
    skipped: rankings.flatMap((ranking) => ranking.skipped).sort((a, b) => a.index - b.index),
    completed: rankings.reduce((sum, ranking) => sum + ranking.completed, 0),
    totalCombinations: rankings.reduce((sum, ranking) => sum + ranking.totalCombinations, 0),
  };
}

export function summarizeSweep(ranking: SweepRanking): SweepSummary {
  const skipReasons: Partial<Record<BacktestErrorCode, number>> = {};
  for (const entry of ranking.skipped) {
    skipReasons[entry.reason.code] = (skipReasons[entry.reason.code] ?? 0) + 1;
  }

  return {
    totalCombinations: ranking.totalCombinations,
    completed: ranking.completed,
    skipped: ranking.skipped.length,
    skipReasons,
    best: ranking.ranked.length > 0 ? ranking.ranked[0] : null,
  };
}
