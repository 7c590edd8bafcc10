import { describe, it, expect } from 'vitest';
import { BAR_INTERVALS, isBarInterval } from '../../src/domain/market/index.js';

describe('isBarInterval', () => {
  it('accepts every supported interval', () => {
    expect(BAR_INTERVALS.every((interval) => isBarInterval(interval))).toBe(true);
  });

  it('rejects unknown values', () => {
    expect(isBarInterval('2d')).toBe(false);
    expect(isBarInterval('1D')).toBe(false);
    expect(isBarInterval(60)).toBe(false);
    expect(isBarInterval(undefined)).toBe(false);
  });
});
