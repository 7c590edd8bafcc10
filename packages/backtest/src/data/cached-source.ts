/**
 * Cached Bar Source
 *
 * Serves repeated requests from a BarCache and falls through to the upstream
 * source on a miss.
 */

import type { PriceSeries } from '@tradelab/core';
import { BarCache } from './bar-cache.js';
import type { BarRequest, BarSource } from './provider.js';

export class CachedBarSource implements BarSource {
  readonly name: string;

  constructor(
    private readonly upstream: BarSource,
    private readonly cache: BarCache = new BarCache()
  ) {
    this.name = `cached:${upstream.name}`;
  }

  async fetchBars(request: BarRequest): Promise<PriceSeries> {
    const cached = this.cache.get(request);
    if (cached) {
      return cached;
    }
    const series = await this.upstream.fetchBars(request);
    this.cache.set(request, series);
    return series;
  }
}
