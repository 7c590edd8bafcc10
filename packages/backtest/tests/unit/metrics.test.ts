import { describe, it, expect } from 'vitest';
import { InvalidParameterError } from '@tradelab/core';
import type { EquityPoint, Trade } from '@tradelab/core';
import { runBacktest } from '../../src/engine/simulator.js';
import { computeDrawdownStatistics, drawdownSeries } from '../../src/metrics/drawdown.js';
import { computeMetrics, validateMetricsOptions } from '../../src/metrics/metrics-engine.js';
import { quantile, periodicReturns } from '../../src/metrics/returns.js';
import { cagr, calmarRatio, sharpeRatio, sortinoRatio, tailRisk } from '../../src/metrics/risk.js';
import { computeTradeStatistics } from '../../src/metrics/trade-stats.js';
import { ENTER_LONG, FRICTIONLESS, flatBars, scripted, series } from '../helpers/fixtures.js';

function curve(values: readonly number[]): EquityPoint[] {
  return values.map((equity, i) => ({ timestamp: i, equity }));
}

function trade(netPnl: number, overrides: Partial<Trade> = {}): Trade {
  return {
    entryTimestamp: 0,
    exitTimestamp: 1,
    direction: 'long',
    entryPrice: 100,
    exitPrice: 100,
    size: 1,
    grossPnl: netPnl,
    commission: 0,
    slippageCost: 0,
    netPnl,
    returnPct: netPnl / 100,
    barsHeld: 1,
    exitReason: 'signal',
    ...overrides,
  };
}

describe('computeMetrics', () => {
  it('reports sentinels, not zeros, when there are no trades', () => {
    const result = runBacktest({ series: series(flatBars([100, 100, 100, 100])), strategy: scripted({}) });
    const metrics = computeMetrics(result);

    expect(metrics.totalTrades).toBe(0);
    expect(metrics.maxConsecutiveWins).toBe(0);
    expect(metrics.maxConsecutiveLosses).toBe(0);
    expect(metrics.profitFactor).toBe('undefined');
    expect(metrics.winRate).toBe('undefined');
    expect(metrics.expectancy).toBe('undefined');
    expect(metrics.sharpeRatio).toBe('undefined');
    expect(metrics.calmarRatio).toBe('undefined');
    expect(metrics.valueAtRisk).toBe('undefined');
    expect(metrics.maxDrawdown).toBe(0);
    expect(metrics.totalReturn).toBe(0);
    expect(metrics.returnCount).toBe(3);
  });

  it('summarizes a single winning run', () => {
    const rising = flatBars([100, 101, 102, 103, 104, 105, 106, 107, 108, 109]);
    const result = runBacktest({ series: series(rising), strategy: scripted({ 0: ENTER_LONG }), config: FRICTIONLESS });
    const metrics = computeMetrics(result);

    expect(metrics.totalReturn).toBeCloseTo(0.09, 12);
    expect(metrics.totalTrades).toBe(1);
    expect(metrics.winRate).toBe(1);
    expect(metrics.profitFactor).toBe('infinite');
    expect(metrics.sortinoRatio).toBe('infinite');
    expect(metrics.maxDrawdown).toBe(0);
    expect(metrics.exitReasons).toEqual({ signal: 0, stop_loss: 0, take_profit: 0, end_of_data: 1 });
    expect(metrics.returnCount).toBe(9);
    expect(Object.isFrozen(metrics)).toBe(true);
  });

  it('rejects out-of-range options', () => {
    expect(() => validateMetricsOptions({ confidenceLevel: 1 })).toThrow(InvalidParameterError);
    expect(validateMetricsOptions({})).toEqual({ periodsPerYear: 252, riskFreeRate: 0.02, confidenceLevel: 0.95 });
  });
});

describe('computeTradeStatistics', () => {
  it('classifies by net PnL and resets streaks on breakeven', () => {
    const stats = computeTradeStatistics([trade(100), trade(-50), trade(0), trade(30), trade(40)]);

    expect(stats.totalTrades).toBe(5);
    expect(stats.winningTrades).toBe(3);
    expect(stats.losingTrades).toBe(1);
    expect(stats.winRate).toBe(0.6);
    expect(stats.profitFactor).toBe(3.4);
    expect(stats.expectancy).toBe(24);
    expect(stats.averageWin).toBeCloseTo(170 / 3, 12);
    expect(stats.averageLoss).toBe(-50);
    expect(stats.largestWin).toBe(100);
    expect(stats.largestLoss).toBe(-50);
    expect(stats.maxConsecutiveWins).toBe(2);
    expect(stats.maxConsecutiveLosses).toBe(1);
  });

  it('counts exit reasons and costs', () => {
    const stats = computeTradeStatistics([
      trade(10, { exitReason: 'stop_loss', commission: 1, slippageCost: 0.5 }),
      trade(-10, { exitReason: 'stop_loss', commission: 2, slippageCost: 0.25 }),
      trade(5, { exitReason: 'end_of_data' }),
    ]);

    expect(stats.exitReasons).toEqual({ signal: 0, stop_loss: 2, take_profit: 0, end_of_data: 1 });
    expect(stats.totalCommission).toBe(3);
    expect(stats.totalSlippage).toBe(0.75);
  });

  it('reports an all-loss ledger with a zero profit factor', () => {
    const stats = computeTradeStatistics([trade(-10), trade(-20)]);
    expect(stats.profitFactor).toBe(0);
    expect(stats.averageWin).toBe('undefined');
    expect(stats.maxConsecutiveLosses).toBe(2);
  });
});

describe('drawdown', () => {
  it('tracks depth, duration and the open underwater run', () => {
    const stats = computeDrawdownStatistics(curve([100, 120, 90, 60, 130, 117]));

    expect(stats.maxDrawdown).toBe(-0.5);
    expect(stats.maxDrawdownDuration).toBe(2);
    expect(stats.underwaterBars).toBe(1);
    expect(stats.ulcerIndex).toBeCloseTo(Math.sqrt((0.0625 + 0.25 + 0.01) / 6), 10);
  });

  it('is clamped to -1 when equity goes negative', () => {
    expect(drawdownSeries(curve([100, -20])).map((point) => point.drawdown)).toEqual([0, -1]);
    expect(computeDrawdownStatistics(curve([100, 0])).maxDrawdown).toBe(-1);
  });
});

describe('return statistics', () => {
  it('computes periodic returns, skipping non-positive bases', () => {
    expect(periodicReturns(curve([100, 110, 0, 50]))).toEqual([0.10000000000000009, -1]);
  });

  it('interpolates quantiles linearly', () => {
    expect(quantile([5, 1, 4, 2, 3], 0.25)).toBe(2);
    expect(quantile([1, 2, 3, 4, 5], 0.1)).toBeCloseTo(1.4, 12);
    expect(quantile([], 0.5)).toBeNull();
  });

  it('annualizes the Sharpe ratio', () => {
    expect(sharpeRatio([0.01, -0.01, 0.02], 0, 1)).toBeCloseTo(0.02 / 3 / Math.sqrt(7 / 30_000), 10);
    expect(sharpeRatio([0, 0, 0], 0, 252)).toBe('undefined');
    expect(sharpeRatio([0.01], 0, 252)).toBe('undefined');
  });

  it('reports an unbounded Sortino ratio with no downside', () => {
    expect(sortinoRatio([0.01, 0.02], 0, 252)).toBe('infinite');
    expect(sortinoRatio([0, 0], 0, 252)).toBe('undefined');
  });

  it('computes CAGR over calendar years', () => {
    const twoYears = 2 * 365.25 * 86_400;
    expect(cagr(100, 121, 0, twoYears)).toBeCloseTo(0.1, 12);
    expect(cagr(100, 121, 0, 0)).toBe('undefined');
    expect(cagr(100, 0, 0, twoYears)).toBe(-1);
  });

  it('divides CAGR by the drawdown depth', () => {
    expect(calmarRatio(0.1, -0.2)).toBe(0.5);
    expect(calmarRatio(0.1, 0)).toBe('infinite');
    expect(calmarRatio('undefined', -0.1)).toBe('undefined');
  });
});

describe('tailRisk', () => {
  it('needs at least ten returns', () => {
    expect(tailRisk([-0.1, 0.1], 0.95)).toEqual({ valueAtRisk: 'undefined', conditionalValueAtRisk: 'undefined' });
  });

  it('averages the returns at or below VaR', () => {
    const returns = [-0.1, -0.05, ...new Array<number>(18).fill(0.01)];
    const { valueAtRisk, conditionalValueAtRisk } = tailRisk(returns, 0.95);

    expect(valueAtRisk).toBeCloseTo(-0.0525, 10);
    expect(conditionalValueAtRisk).toBe(-0.1);
  });
});
