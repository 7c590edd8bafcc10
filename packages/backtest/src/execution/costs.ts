/**
 * Execution Cost Model
 * ====================
 *
 * Slippage moves every fill against the trade; commission is a fraction of
 * fill notional, charged on entry and on exit.
 */

import type { TradeDirection } from '@tradelab/core';

export type FillSide = 'entry' | 'exit';

/**
 * True when the fill buys: long entry or short exit
 */
export function isBuyFill(direction: TradeDirection, side: FillSide): boolean {
  return (direction === 'long') === (side === 'entry');
}

/**
 * Apply slippage to a reference price
 *
 * Buys fill at price x (1 + rate), sells at price x (1 - rate).
 */
export function applySlippage(
  price: number,
  slippageRate: number,
  direction: TradeDirection,
  side: FillSide
): number {
  return isBuyFill(direction, side) ? price * (1 + slippageRate) : price * (1 - slippageRate);
}

export function calculateCommission(fillPrice: number, size: number, commissionRate: number): number {
  return fillPrice * size * commissionRate;
}

/**
 * Slippage cost in account currency
 */
export function calculateSlippageCost(fillPrice: number, referencePrice: number, size: number): number {
  return Math.abs(fillPrice - referencePrice) * size;
}

export interface Fill {
  readonly referencePrice: number;
  readonly price: number;
  readonly commission: number;
  readonly slippageCost: number;
}

/**
 * Price a fill at a reference price
 */
export function executeFill(
  referencePrice: number,
  size: number,
  direction: TradeDirection,
  side: FillSide,
  rates: { readonly commissionRate: number; readonly slippageRate: number }
): Fill {
  const price = applySlippage(referencePrice, rates.slippageRate, direction, side);
  return {
    referencePrice,
    price,
    commission: calculateCommission(price, size, rates.commissionRate),
    slippageCost: calculateSlippageCost(price, referencePrice, size),
  };
}

/**
 * Cash change caused by a fill
 *
 * Buying pays notional plus commission; selling receives notional less commission.
 */
export function cashDelta(fill: Fill, size: number, direction: TradeDirection, side: FillSide): number {
  const notional = fill.price * size;
  return isBuyFill(direction, side) ? -(notional + fill.commission) : notional - fill.commission;
}
