/**
 * Trading Domain Types
 * ====================
 * Signals emitted by strategies, the simulator's position, and the closed-trade
 * ledger.
 */

export type SignalAction = 'enter_long' | 'enter_short' | 'exit' | 'hold';

/**
 * Per-bar strategy output.
 *
 * Stop and target prices only matter on entry signals; they override the
 * configured percentage distances for that position.
 */
export interface Signal {
  readonly action: SignalAction;
  readonly stopLossPrice?: number;
  readonly takeProfitPrice?: number;
}

export type PositionDirection = 'flat' | 'long' | 'short';

export type TradeDirection = Exclude<PositionDirection, 'flat'>;

export type ExitReason = 'signal' | 'stop_loss' | 'take_profit' | 'end_of_data';

export const EXIT_REASONS: readonly ExitReason[] = ['signal', 'stop_loss', 'take_profit', 'end_of_data'];

export interface FlatPosition {
  readonly direction: 'flat';
}

export interface OpenPosition {
  readonly direction: TradeDirection;
  /** Fill price, slippage included */
  readonly entryPrice: number;
  /** Close of the entry bar before slippage */
  readonly entryReferencePrice: number;
  readonly entryTimestamp: number;
  readonly entryIndex: number;
  readonly size: number;
  readonly stopLoss?: number;
  readonly takeProfit?: number;
  readonly entryCommission: number;
  readonly entrySlippageCost: number;
}

export type Position = FlatPosition | OpenPosition;

export const FLAT_POSITION: FlatPosition = Object.freeze({ direction: 'flat' });

/**
 * A closed round trip. Immutable once appended to the ledger.
 */
export interface Trade {
  readonly entryTimestamp: number;
  readonly exitTimestamp: number;
  readonly direction: TradeDirection;
  /** Fill prices, slippage included */
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly size: number;
  /** PnL at the unslipped reference prices */
  readonly grossPnl: number;
  /** Entry plus exit commission */
  readonly commission: number;
  /** Entry plus exit slippage, in account currency */
  readonly slippageCost: number;
  /** grossPnl - commission - slippageCost */
  readonly netPnl: number;
  /** netPnl relative to the entry notional */
  readonly returnPct: number;
  readonly barsHeld: number;
  readonly exitReason: ExitReason;
}

export interface EquityPoint {
  readonly timestamp: number;
  readonly equity: number;
}

export function isOpenPosition(position: Position): position is OpenPosition {
  return position.direction !== 'flat';
}
