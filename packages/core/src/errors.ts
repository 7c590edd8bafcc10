/**
 * Core Error Classes
 * ==================
 * Typed errors shared by every @tradelab package.
 *
 * This package has zero dependencies on other @tradelab packages, so the error
 * taxonomy lives here and is re-used by the simulator, the metrics engine and
 * the optimizer.
 */

export type BacktestErrorCode = 'INSUFFICIENT_DATA' | 'INVALID_PARAMETER' | 'DATA_INTEGRITY';

/**
 * Base class for all backtest errors
 */
export abstract class BacktestError extends Error {
  public readonly code: BacktestErrorCode;
  public readonly context: Record<string, unknown>;

  protected constructor(message: string, code: BacktestErrorCode, context: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging and sweep records
   */
  toJSON(): { name: string; code: BacktestErrorCode; message: string; context: Record<string, unknown> } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Not enough bars for the strategy's declared lookback
 */
export class InsufficientDataError extends BacktestError {
  public readonly required: number;
  public readonly available: number;

  constructor(required: number, available: number, context: Record<string, unknown> = {}) {
    const subject = typeof context.strategy === 'string' ? `Strategy '${context.strategy}'` : 'Backtest';
    super(
      `${subject} requires at least ${required} bars, but only ${available} are available`,
      'INSUFFICIENT_DATA',
      { required, available, ...context }
    );
    this.required = required;
    this.available = available;
  }
}

/**
 * Malformed, out-of-range or logically inconsistent parameter
 */
export class InvalidParameterError extends BacktestError {
  public readonly parameter?: string;

  constructor(message: string, parameter?: string, context: Record<string, unknown> = {}) {
    super(message, 'INVALID_PARAMETER', parameter !== undefined ? { parameter, ...context } : context);
    this.parameter = parameter;
  }
}

/**
 * Upstream data defect: non-monotonic timestamps, NaN or non-positive prices
 */
export class DataIntegrityError extends BacktestError {
  public readonly issue: string;

  constructor(message: string, issue: string, context: Record<string, unknown> = {}) {
    super(message, 'DATA_INTEGRITY', { issue, ...context });
    this.issue = issue;
  }
}

/**
 * Errors that end a single run but leave a parameter sweep usable
 */
export function isSkippableError(
  error: unknown
): error is InsufficientDataError | InvalidParameterError {
  return error instanceof InsufficientDataError || error instanceof InvalidParameterError;
}
