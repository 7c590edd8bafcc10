/**
 * Bar Cache
 * =========
 * In-memory price series cache with TTL expiry and a size bound.
 * Entries are evicted oldest first once `maxEntries` is reached.
 */

import type { PriceSeries } from '@tradelab/core';
import { InvalidParameterError } from '@tradelab/core';
import { LogHelpers } from '@tradelab/utils';
import { logger } from '../logger.js';
import { barRequestKey } from './provider.js';
import type { BarRequest } from './provider.js';

const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;
const DEFAULT_MAX_ENTRIES = 100;

export interface BarCacheOptions {
  /** Default: 24 hours */
  ttlMs?: number;
  /** Default: 100 */
  maxEntries?: number;
  /** Milliseconds since epoch */
  clock?: () => number;
}

interface CacheEntry {
  series: PriceSeries;
  storedAt: number;
}

export class BarCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly clock: () => number;

  constructor(options: BarCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.clock = options.clock ?? Date.now;

    if (!(this.ttlMs > 0)) {
      throw new InvalidParameterError('ttlMs must be positive', 'ttlMs', { value: this.ttlMs });
    }
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new InvalidParameterError('maxEntries must be a positive integer', 'maxEntries', {
        value: this.maxEntries,
      });
    }
  }

  get(request: BarRequest): PriceSeries | undefined {
    const key = barRequestKey(request);
    const entry = this.entries.get(key);
    if (!entry) {
      LogHelpers.cache(logger, 'miss', key);
      return undefined;
    }
    if (this.clock() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key);
      LogHelpers.cache(logger, 'expired', key);
      return undefined;
    }
    LogHelpers.cache(logger, 'hit', key);
    return entry.series;
  }

  set(request: BarRequest, series: PriceSeries): void {
    const key = barRequestKey(request);
    // Re-inserting moves the key to the newest position
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      LogHelpers.cache(logger, 'delete', oldest.value);
    }
    this.entries.set(key, { series, storedAt: this.clock() });
    LogHelpers.cache(logger, 'set', key);
  }

  invalidate(request: BarRequest): boolean {
    const key = barRequestKey(request);
    const removed = this.entries.delete(key);
    if (removed) {
      LogHelpers.cache(logger, 'delete', key);
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }
}
