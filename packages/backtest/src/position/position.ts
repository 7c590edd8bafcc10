/**
 * Position Management
 * ===================
 * Pure functions over the simulator's single position: open, mark, detect
 * risk exits and close into a Trade. Nothing here mutates its inputs.
 */

import { InvalidParameterError } from '@tradelab/core';
import type {
  Bar,
  ExitPriority,
  ExitReason,
  OpenPosition,
  Signal,
  SimulationConfig,
  Trade,
  TradeDirection,
} from '@tradelab/core';
import { applySlippage, cashDelta, executeFill } from '../execution/costs.js';

export interface RiskLevels {
  readonly stopLoss?: number;
  readonly takeProfit?: number;
}

function assertLevel(
  name: 'stopLossPrice' | 'takeProfitPrice',
  level: number,
  direction: TradeDirection,
  entryReferencePrice: number
): void {
  if (!Number.isFinite(level) || level <= 0) {
    throw new InvalidParameterError(`${name} must be a positive finite price`, name, { value: level });
  }

  const belowEntry = level < entryReferencePrice;
  const aboveEntry = level > entryReferencePrice;
  // Long stops sit below entry and targets above; short positions mirror this.
  const valid =
    name === 'stopLossPrice'
      ? direction === 'long'
        ? belowEntry
        : aboveEntry
      : direction === 'long'
        ? aboveEntry
        : belowEntry;

  if (!valid) {
    throw new InvalidParameterError(
      `${name} ${level} is on the wrong side of the ${direction} entry at ${entryReferencePrice}`,
      name,
      { value: level, direction, entryPrice: entryReferencePrice }
    );
  }
}

/**
 * Stop and target for a new position
 *
 * Signal prices win over the configured percentage distances.
 */
export function resolveRiskLevels(
  direction: TradeDirection,
  entryReferencePrice: number,
  signal: Signal,
  config: Pick<SimulationConfig, 'stopLossPct' | 'takeProfitPct'>
): RiskLevels {
  const sign = direction === 'long' ? 1 : -1;

  let stopLoss = signal.stopLossPrice;
  if (stopLoss === undefined && config.stopLossPct !== undefined) {
    stopLoss = entryReferencePrice * (1 - sign * config.stopLossPct);
  }

  let takeProfit = signal.takeProfitPrice;
  if (takeProfit === undefined && config.takeProfitPct !== undefined) {
    takeProfit = entryReferencePrice * (1 + sign * config.takeProfitPct);
    if (takeProfit <= 0) {
      throw new InvalidParameterError(
        `takeProfitPct ${config.takeProfitPct} puts the ${direction} target at or below zero`,
        'takeProfitPct',
        { value: config.takeProfitPct, direction, entryPrice: entryReferencePrice }
      );
    }
  }

  // Levels derived from the configured distances are on the correct side by construction.
  if (signal.stopLossPrice !== undefined) {
    assertLevel('stopLossPrice', signal.stopLossPrice, direction, entryReferencePrice);
  }
  if (signal.takeProfitPrice !== undefined) {
    assertLevel('takeProfitPrice', signal.takeProfitPrice, direction, entryReferencePrice);
  }

  return {
    ...(stopLoss !== undefined ? { stopLoss } : {}),
    ...(takeProfit !== undefined ? { takeProfit } : {}),
  };
}

export interface OpenPositionParams {
  direction: TradeDirection;
  bar: Bar;
  index: number;
  /** Account value at the moment of entry */
  equity: number;
  levels: RiskLevels;
  config: SimulationConfig;
}

export interface PositionChange<T> {
  readonly value: T;
  readonly cashDelta: number;
}

/**
 * Open a position at the bar's close, sized as a fraction of equity
 */
export function openPosition(params: OpenPositionParams): PositionChange<OpenPosition> {
  const { direction, bar, index, equity, levels, config } = params;
  const referencePrice = bar.close;
  const entryPrice = applySlippage(referencePrice, config.slippageRate, direction, 'entry');
  const size = (config.maxPositionFraction * equity) / entryPrice;
  const fill = executeFill(referencePrice, size, direction, 'entry', config);

  const position: OpenPosition = Object.freeze({
    direction,
    entryPrice: fill.price,
    entryReferencePrice: referencePrice,
    entryTimestamp: bar.timestamp,
    entryIndex: index,
    size,
    ...levels,
    entryCommission: fill.commission,
    entrySlippageCost: fill.slippageCost,
  });

  return { value: position, cashDelta: cashDelta(fill, size, direction, 'entry') };
}

/**
 * Value of the position at a mark price: +size x price long, -size x price short
 */
export function positionValue(position: OpenPosition, markPrice: number): number {
  return position.direction === 'long' ? position.size * markPrice : -position.size * markPrice;
}

export interface RiskExit {
  readonly reason: Extract<ExitReason, 'stop_loss' | 'take_profit'>;
  readonly price: number;
}

/**
 * Check the bar's range against the position's stop and target
 *
 * A breach exits at the breached level. When both breach in the same bar,
 * `priority` decides.
 */
export function detectRiskExit(position: OpenPosition, bar: Bar, priority: ExitPriority): RiskExit | null {
  const { stopLoss, takeProfit } = position;
  const isLong = position.direction === 'long';

  const stopHit = stopLoss !== undefined && (isLong ? bar.low <= stopLoss : bar.high >= stopLoss);
  const targetHit = takeProfit !== undefined && (isLong ? bar.high >= takeProfit : bar.low <= takeProfit);

  const stopExit: RiskExit | null = stopHit && stopLoss !== undefined ? { reason: 'stop_loss', price: stopLoss } : null;
  const targetExit: RiskExit | null =
    targetHit && takeProfit !== undefined ? { reason: 'take_profit', price: takeProfit } : null;

  if (priority === 'take_profit_first') {
    return targetExit ?? stopExit;
  }
  return stopExit ?? targetExit;
}

export interface ClosePositionParams {
  referencePrice: number;
  bar: Bar;
  index: number;
  reason: ExitReason;
  config: SimulationConfig;
}

/**
 * Close the position into an immutable Trade
 */
export function closePosition(position: OpenPosition, params: ClosePositionParams): PositionChange<Trade> {
  const { referencePrice, bar, index, reason, config } = params;
  const { direction, size } = position;
  const fill = executeFill(referencePrice, size, direction, 'exit', config);

  const grossPnl =
    direction === 'long'
      ? (referencePrice - position.entryReferencePrice) * size
      : (position.entryReferencePrice - referencePrice) * size;
  const commission = position.entryCommission + fill.commission;
  const slippageCost = position.entrySlippageCost + fill.slippageCost;
  const netPnl = grossPnl - commission - slippageCost;
  const entryNotional = position.entryPrice * size;

  const trade: Trade = Object.freeze({
    entryTimestamp: position.entryTimestamp,
    exitTimestamp: bar.timestamp,
    direction,
    entryPrice: position.entryPrice,
    exitPrice: fill.price,
    size,
    grossPnl,
    commission,
    slippageCost,
    netPnl,
    returnPct: entryNotional > 0 ? netPnl / entryNotional : 0,
    barsHeld: index - position.entryIndex,
    exitReason: reason,
  });

  return { value: trade, cashDelta: cashDelta(fill, size, direction, 'exit') };
}
