/**
 * Trade Statistics
 *
 * A trade wins when its net PnL is positive and loses when it is negative.
 * Breakeven trades count toward the total only and end both streaks.
 */

import type { ExitReason, Trade } from '@tradelab/core';
import type { MetricValue, TradeStatistics } from './types.js';

function ratio(numerator: number, denominator: number): MetricValue {
  return denominator === 0 ? 'undefined' : numerator / denominator;
}

function average(values: readonly number[]): MetricValue {
  return ratio(
    values.reduce((sum, v) => sum + v, 0),
    values.length
  );
}

export function computeTradeStatistics(trades: readonly Trade[]): TradeStatistics {
  const wins = trades.filter((t) => t.netPnl > 0).map((t) => t.netPnl);
  const losses = trades.filter((t) => t.netPnl < 0).map((t) => t.netPnl);

  const grossProfit = wins.reduce((sum, v) => sum + v, 0);
  const grossLoss = Math.abs(losses.reduce((sum, v) => sum + v, 0));

  let profitFactor: MetricValue;
  if (grossLoss > 0) {
    profitFactor = grossProfit / grossLoss;
  } else {
    profitFactor = wins.length > 0 ? 'infinite' : 'undefined';
  }

  // Consecutive wins/losses, chronological order
  let maxConsecutiveWins = 0;
  let maxConsecutiveLosses = 0;
  let currentWins = 0;
  let currentLosses = 0;
  for (const trade of trades) {
    if (trade.netPnl > 0) {
      currentWins += 1;
      currentLosses = 0;
    } else if (trade.netPnl < 0) {
      currentLosses += 1;
      currentWins = 0;
    } else {
      currentWins = 0;
      currentLosses = 0;
    }
    maxConsecutiveWins = Math.max(maxConsecutiveWins, currentWins);
    maxConsecutiveLosses = Math.max(maxConsecutiveLosses, currentLosses);
  }

  const exitReasons: Record<ExitReason, number> = { signal: 0, stop_loss: 0, take_profit: 0, end_of_data: 0 };
  for (const trade of trades) {
    exitReasons[trade.exitReason] += 1;
  }

  return {
    totalTrades: trades.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRate: ratio(wins.length, trades.length),
    profitFactor,
    expectancy: average(trades.map((t) => t.netPnl)),
    averageWin: average(wins),
    averageLoss: average(losses),
    largestWin: wins.length > 0 ? Math.max(...wins) : 'undefined',
    largestLoss: losses.length > 0 ? Math.min(...losses) : 'undefined',
    maxConsecutiveWins,
    maxConsecutiveLosses,
    averageBarsHeld: average(trades.map((t) => t.barsHeld)),
    totalCommission: trades.reduce((sum, t) => sum + t.commission, 0),
    totalSlippage: trades.reduce((sum, t) => sum + t.slippageCost, 0),
    exitReasons,
  };
}
