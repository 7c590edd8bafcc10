/**
 * Backtest Domain Types
 */

import type { BarInterval } from '../market/index.js';
import type { EquityPoint, Trade } from '../trading/index.js';

export type ParamValue = number | string | boolean;

/**
 * One point in a parameter space: parameter name to value
 */
export type ParameterSet = Readonly<Record<string, ParamValue>>;

/**
 * Candidate values per parameter name
 */
export type ParameterGrid = Readonly<Record<string, readonly ParamValue[]>>;

export type ExitPriority = 'stop_loss_first' | 'take_profit_first';

/**
 * Execution settings for one simulation run
 */
export interface SimulationConfig {
  readonly initialCapital: number;
  /** Fraction of fill notional charged on entry and on exit */
  readonly commissionRate: number;
  /** Adverse fill adjustment as a fraction of price */
  readonly slippageRate: number;
  /** Fraction of equity committed on entry */
  readonly maxPositionFraction: number;
  /** Default stop distance as a fraction of the entry price */
  readonly stopLossPct?: number;
  /** Default target distance as a fraction of the entry price */
  readonly takeProfitPct?: number;
  /** Which exit wins when one bar breaches both levels */
  readonly exitPriority: ExitPriority;
}

/**
 * Output of one simulation run. Frozen after creation.
 */
export interface BacktestResult {
  /** Deterministic hash of strategy, symbol, period, parameters and config */
  readonly runId: string;
  readonly strategy: string;
  readonly symbol: string;
  readonly interval: BarInterval;
  readonly period: {
    readonly start: number;
    readonly end: number;
  };
  readonly parameters: ParameterSet;
  readonly config: SimulationConfig;
  readonly trades: readonly Trade[];
  readonly equityCurve: readonly EquityPoint[];
  readonly initialCapital: number;
  readonly finalEquity: number;
}
