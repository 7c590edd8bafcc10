/**
 * Execution Simulator
 * ===================
 * Deterministic bar-by-bar replay of a price series against a strategy.
 *
 * The run is a fold over the bars: `advance` takes the previous state and one
 * bar and returns the next state, that bar's equity point and any trade it
 * closed. Per bar: risk exits, then the strategy signal, then the equity mark.
 */

import { FLAT_POSITION, InsufficientDataError, computeParameterHash, isOpenPosition } from '@tradelab/core';
import type {
  BacktestResult,
  Bar,
  EquityPoint,
  ParameterSet,
  Position,
  PriceSeries,
  Signal,
  SimulationConfig,
  Trade,
} from '@tradelab/core';
import { validateSimulationConfig } from '../config.js';
import type { SimulationConfigInput } from '../config.js';
import { logger } from '../logger.js';
import { computeMetrics } from '../metrics/metrics-engine.js';
import type { MetricsOptionsInput, PerformanceMetrics } from '../metrics/types.js';
import { closePosition, detectRiskExit, openPosition, positionValue, resolveRiskLevels } from '../position/position.js';
import { assertBarIntegrity } from '../series/price-series.js';
import type { PreparedStrategy, Strategy } from '../strategies/types.js';

export interface SimulationState {
  readonly position: Position;
  readonly cash: number;
}

export interface SimulationContext {
  readonly bars: readonly Bar[];
  readonly prepared: PreparedStrategy;
  readonly config: SimulationConfig;
}

export interface StepResult {
  readonly state: SimulationState;
  readonly equityPoint: EquityPoint;
  readonly closedTrade?: Trade;
}

export function initialState(config: SimulationConfig): SimulationState {
  return { position: FLAT_POSITION, cash: config.initialCapital };
}

function markToMarket(state: SimulationState, price: number): number {
  return isOpenPosition(state.position) ? state.cash + positionValue(state.position, price) : state.cash;
}

interface Transition {
  state: SimulationState;
  closedTrade?: Trade;
}

function applySignal(state: SimulationState, signal: Signal, bar: Bar, index: number, context: SimulationContext): Transition {
  const { position, cash } = state;
  const { config } = context;

  if (signal.action === 'exit') {
    if (!isOpenPosition(position)) return { state };
    const closed = closePosition(position, { referencePrice: bar.close, bar, index, reason: 'signal', config });
    return { state: { position: FLAT_POSITION, cash: cash + closed.cashDelta }, closedTrade: closed.value };
  }

  if (signal.action === 'enter_long' || signal.action === 'enter_short') {
    // Entries need a later bar to close on, and only happen from flat.
    const isLastBar = index === context.bars.length - 1;
    if (isOpenPosition(position) || isLastBar || cash <= 0) return { state };

    const direction = signal.action === 'enter_long' ? 'long' : 'short';
    const levels = resolveRiskLevels(direction, bar.close, signal, config);
    const opened = openPosition({ direction, bar, index, equity: cash, levels, config });
    return { state: { position: opened.value, cash: cash + opened.cashDelta } };
  }

  return { state };
}

/**
 * Advance the simulation by one bar
 */
export function advance(state: SimulationState, bar: Bar, index: number, context: SimulationContext): StepResult {
  const { prepared, config } = context;
  let current = state;
  let closedTrade: Trade | undefined;

  // 1. Risk exits, from the bar after entry
  const { position } = current;
  if (isOpenPosition(position) && index > position.entryIndex) {
    const exit = detectRiskExit(position, bar, config.exitPriority);
    if (exit) {
      const closed = closePosition(position, { referencePrice: exit.price, bar, index, reason: exit.reason, config });
      current = { position: FLAT_POSITION, cash: current.cash + closed.cashDelta };
      closedTrade = closed.value;
    }
  }

  // 2-4. Strategy signal, only when no forced exit happened on this bar
  if (closedTrade === undefined && index >= prepared.lookback - 1) {
    const signal = prepared.signal(context.bars.slice(0, index + 1));
    const transition = applySignal(current, signal, bar, index, context);
    current = transition.state;
    closedTrade = transition.closedTrade;
  }

  // 6. End of data
  const open = current.position;
  if (index === context.bars.length - 1 && isOpenPosition(open)) {
    const closed = closePosition(open, { referencePrice: bar.close, bar, index, reason: 'end_of_data', config });
    current = { position: FLAT_POSITION, cash: current.cash + closed.cashDelta };
    closedTrade = closed.value;
  }

  // 5. Mark
  const equityPoint: EquityPoint = Object.freeze({ timestamp: bar.timestamp, equity: markToMarket(current, bar.close) });

  return closedTrade ? { state: current, equityPoint, closedTrade } : { state: current, equityPoint };
}

/**
 * Run a prepared strategy over a series whose integrity is already checked
 */
export function simulate(series: PriceSeries, prepared: PreparedStrategy, config: SimulationConfig): BacktestResult {
  const { bars, symbol, interval } = series;
  const required = Math.max(prepared.lookback, 1);
  if (bars.length < required) {
    throw new InsufficientDataError(required, bars.length, { strategy: prepared.strategy, symbol });
  }

  const period = Object.freeze({ start: bars[0].timestamp, end: bars[bars.length - 1].timestamp });
  const runId = computeParameterHash({
    strategy: prepared.strategy,
    symbol,
    interval,
    period,
    parameters: prepared.parameters,
    config,
  });
  const runLogger = logger.child({ runId, strategy: prepared.strategy, symbol, interval });
  runLogger.debug('Backtest started', { bars: bars.length, lookback: prepared.lookback });

  const context: SimulationContext = { bars, prepared, config };
  const trades: Trade[] = [];
  const equityCurve: EquityPoint[] = [];

  let state = initialState(config);
  for (let index = 0; index < bars.length; index++) {
    const step = advance(state, bars[index], index, context);
    state = step.state;
    equityCurve.push(step.equityPoint);
    if (step.closedTrade) {
      trades.push(step.closedTrade);
    }
  }

  const finalEquity = equityCurve[equityCurve.length - 1].equity;
  runLogger.debug('Backtest completed', { trades: trades.length, finalEquity });

  return Object.freeze({
    runId,
    strategy: prepared.strategy,
    symbol,
    interval,
    period,
    parameters: prepared.parameters,
    config,
    trades: Object.freeze(trades),
    equityCurve: Object.freeze(equityCurve),
    initialCapital: config.initialCapital,
    finalEquity,
  });
}

export interface BacktestInput {
  series: PriceSeries;
  strategy: Strategy;
  params?: ParameterSet;
  config?: SimulationConfigInput;
}

/**
 * Validate inputs and run one backtest
 *
 * @throws DataIntegrityError, InvalidParameterError, InsufficientDataError
 */
export function runBacktest(input: BacktestInput): BacktestResult {
  const { series, strategy } = input;
  const config = validateSimulationConfig(input.config ?? {});
  assertBarIntegrity(series.bars, { symbol: series.symbol, interval: series.interval });
  const prepared = strategy.prepare(input.params ?? {});
  return simulate(series, prepared, config);
}

export interface BacktestReport {
  readonly result: BacktestResult;
  readonly metrics: PerformanceMetrics;
}

/**
 * Run one backtest and compute its metrics
 */
export function runBacktestReport(input: BacktestInput, metricsOptions: MetricsOptionsInput = {}): BacktestReport {
  const result = runBacktest(input);
  return Object.freeze({ result, metrics: computeMetrics(result, metricsOptions) });
}
