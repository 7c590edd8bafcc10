import { describe, it, expect } from 'vitest';
import { InvalidParameterError } from '@tradelab/core';
import type { OpenPosition } from '@tradelab/core';
import { applySlippage, cashDelta, executeFill, isBuyFill } from '../../src/execution/costs.js';
import {
  closePosition,
  detectRiskExit,
  openPosition,
  positionValue,
  resolveRiskLevels,
} from '../../src/position/position.js';
import { FRICTIONLESS, bar } from '../helpers/fixtures.js';

describe('cost model', () => {
  it('identifies buy fills', () => {
    expect(isBuyFill('long', 'entry')).toBe(true);
    expect(isBuyFill('long', 'exit')).toBe(false);
    expect(isBuyFill('short', 'entry')).toBe(false);
    expect(isBuyFill('short', 'exit')).toBe(true);
  });

  it('slips every fill against the trade', () => {
    expect(applySlippage(100, 0.01, 'long', 'entry')).toBe(101);
    expect(applySlippage(100, 0.01, 'long', 'exit')).toBe(99);
    expect(applySlippage(100, 0.01, 'short', 'entry')).toBe(99);
    expect(applySlippage(100, 0.01, 'short', 'exit')).toBe(101);
  });

  it('charges commission on fill notional', () => {
    const fill = executeFill(100, 10, 'long', 'entry', { commissionRate: 0.5, slippageRate: 0.25 });
    expect(fill).toEqual({ referencePrice: 100, price: 125, commission: 625, slippageCost: 250 });
    expect(cashDelta(fill, 10, 'long', 'entry')).toBe(-1875);

    const sell = executeFill(100, 10, 'long', 'exit', { commissionRate: 0.5, slippageRate: 0.25 });
    expect(sell.price).toBe(75);
    expect(cashDelta(sell, 10, 'long', 'exit')).toBe(375);
  });
});

describe('resolveRiskLevels', () => {
  it('derives levels from the configured distances', () => {
    expect(resolveRiskLevels('long', 200, { action: 'enter_long' }, { stopLossPct: 0.5, takeProfitPct: 0.25 })).toEqual({
      stopLoss: 100,
      takeProfit: 250,
    });
    expect(resolveRiskLevels('short', 200, { action: 'enter_short' }, { stopLossPct: 0.5, takeProfitPct: 0.25 })).toEqual({
      stopLoss: 300,
      takeProfit: 150,
    });
  });

  it('prefers signal prices', () => {
    expect(
      resolveRiskLevels('long', 100, { action: 'enter_long', stopLossPrice: 90 }, { stopLossPct: 0.5 })
    ).toEqual({ stopLoss: 90 });
  });

  it('allows long targets beyond 100% but not short targets at or below zero', () => {
    expect(resolveRiskLevels('long', 100, { action: 'enter_long' }, { takeProfitPct: 1.5 })).toEqual({ takeProfit: 250 });
    expect(() => resolveRiskLevels('short', 100, { action: 'enter_short' }, { takeProfitPct: 1 })).toThrow(
      InvalidParameterError
    );
  });

  it('returns no levels when none are configured', () => {
    expect(resolveRiskLevels('long', 100, { action: 'enter_long' }, {})).toEqual({});
  });

  it('rejects signal levels on the wrong side', () => {
    expect(() => resolveRiskLevels('short', 100, { action: 'enter_short', stopLossPrice: 90 }, {})).toThrow(
      'stopLossPrice 90 is on the wrong side of the short entry at 100'
    );
    expect(() => resolveRiskLevels('long', 100, { action: 'enter_long', takeProfitPrice: -1 }, {})).toThrow(
      InvalidParameterError
    );
  });
});

describe('position lifecycle', () => {
  const entryBar = bar(0, 50, 50, 50, 50);

  it('opens a long sized from equity', () => {
    const { value, cashDelta: delta } = openPosition({
      direction: 'long',
      bar: entryBar,
      index: 0,
      equity: 1000,
      levels: { stopLoss: 40 },
      config: FRICTIONLESS,
    });

    expect(value).toMatchObject({ direction: 'long', entryPrice: 50, size: 20, stopLoss: 40, entryIndex: 0 });
    expect(delta).toBe(-1000);
    expect(positionValue(value, 60)).toBe(1200);
  });

  it('marks shorts as a liability', () => {
    const { value } = openPosition({ direction: 'short', bar: entryBar, index: 0, equity: 1000, levels: {}, config: FRICTIONLESS });
    expect(positionValue(value, 60)).toBe(-1200);
  });

  it('closes into a trade', () => {
    const { value } = openPosition({ direction: 'long', bar: entryBar, index: 0, equity: 1000, levels: {}, config: FRICTIONLESS });
    const closed = closePosition(value, { referencePrice: 55, bar: bar(3, 55, 55, 55, 55), index: 3, reason: 'signal', config: FRICTIONLESS });

    expect(closed.value).toMatchObject({ grossPnl: 100, netPnl: 100, returnPct: 0.1, barsHeld: 3, exitReason: 'signal' });
    expect(closed.cashDelta).toBe(1100);
  });
});

describe('detectRiskExit', () => {
  const long: OpenPosition = {
    direction: 'long',
    entryPrice: 100,
    entryReferencePrice: 100,
    entryTimestamp: 0,
    entryIndex: 0,
    size: 1,
    stopLoss: 90,
    takeProfit: 120,
    entryCommission: 0,
    entrySlippageCost: 0,
  };

  it('returns null inside the range', () => {
    expect(detectRiskExit(long, bar(1, 100, 110, 95, 100), 'stop_loss_first')).toBeNull();
  });

  it('fills at the breached level', () => {
    expect(detectRiskExit(long, bar(1, 100, 125, 95, 100), 'stop_loss_first')).toEqual({ reason: 'take_profit', price: 120 });
    expect(detectRiskExit(long, bar(1, 85, 100, 80, 95), 'take_profit_first')).toEqual({ reason: 'stop_loss', price: 90 });
  });

  it('checks the opposite sides for shorts', () => {
    const short: OpenPosition = { ...long, direction: 'short', stopLoss: 110, takeProfit: 80 };
    expect(detectRiskExit(short, bar(1, 100, 112, 95, 100), 'stop_loss_first')).toEqual({ reason: 'stop_loss', price: 110 });
    expect(detectRiskExit(short, bar(1, 90, 95, 75, 80), 'stop_loss_first')).toEqual({ reason: 'take_profit', price: 80 });
  });
});
