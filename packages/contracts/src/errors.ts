/**
 * @fileoverview Error taxonomy for the price-bar data model.
 *
 * Every error raised by the model extends {@link PriceBarsError} and carries a
 * machine-readable code, a structured data payload and an ISO timestamp.
 *
 * @module @pricebars/contracts/errors
 */

/**
 * Identifier of one OHLC ordering rule.
 */
export type BarRule = 'H>=O' | 'H>=L' | 'H>=C' | 'L<=O' | 'L<=H' | 'L<=C';

/**
 * Base error class for all price-bar errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new PriceBarsError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class PriceBarsError extends Error {
  /** Machine-readable error code (e.g. 'MISSING_SYMBOL') */
  readonly code: string;

  /** Structured context for debugging */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a bar breaks one or more of the OHLC ordering rules.
 *
 * Lists every broken rule, never just the first.
 */
export class InvariantViolationError extends PriceBarsError {
  readonly violations: readonly BarRule[];

  constructor(message: string, data: { violations: BarRule[]; bar: string }) {
    super('INVARIANT_VIOLATION', message, data);
    this.violations = [...data.violations];
  }
}

/**
 * Thrown when a bar field is not a usable value (invalid date, non-finite
 * number, negative countdown).
 */
export class InvalidBarInputError extends PriceBarsError {
  constructor(message: string, data: { field: string; value: unknown }) {
    super('INVALID_BAR_INPUT', message, data);
  }
}

/**
 * Thrown when a cross-section is built from zero bars.
 */
export class EmptyInputError extends PriceBarsError {
  constructor(message = 'No bars supplied') {
    super('EMPTY_INPUT', message);
  }
}

/**
 * Thrown when the bars of a cross-section disagree on their timestamp.
 *
 * @example
 * ```typescript
 * throw new DesynchronizedTimestampsError('Bar date times are not in sync', {
 *   symbol: 'MSFT',
 *   dateTime: '2024-03-04T14:31:00.000Z',
 *   referenceSymbol: 'AAPL',
 *   referenceDateTime: '2024-03-04T14:30:00.000Z',
 * });
 * ```
 */
export class DesynchronizedTimestampsError extends PriceBarsError {
  readonly symbol: string;
  readonly referenceSymbol: string;

  constructor(
    message: string,
    data: { symbol: string; dateTime: string; referenceSymbol: string; referenceDateTime: string }
  ) {
    super('DESYNCHRONIZED_TIMESTAMPS', message, data);
    this.symbol = data.symbol;
    this.referenceSymbol = data.referenceSymbol;
  }
}

/**
 * Thrown by indexed lookup when a symbol is not part of a cross-section.
 */
export class MissingSymbolError extends PriceBarsError {
  readonly symbol: string;

  constructor(symbol: string) {
    super('MISSING_SYMBOL', `Symbol not found: ${symbol}`, { symbol });
    this.symbol = symbol;
  }
}

/**
 * Thrown when an adjusted price is requested from a bar whose raw close is
 * zero.
 */
export class UndefinedAdjustmentError extends PriceBarsError {
  constructor(message: string, data: { field: 'open' | 'high' | 'low'; close: number; adjClose: number }) {
    super('UNDEFINED_ADJUSTMENT', message, data);
  }
}

/**
 * Thrown when a frequency token or name is not one of the supported ones.
 */
export class UnknownFrequencyError extends PriceBarsError {
  constructor(value: unknown) {
    super('UNKNOWN_FREQUENCY', `Unknown frequency: ${String(value)}`, { value });
  }
}

export function isPriceBarsError(error: unknown): error is PriceBarsError {
  return error instanceof PriceBarsError;
}

export function isInvariantViolationError(error: unknown): error is InvariantViolationError {
  return error instanceof InvariantViolationError;
}

export function isEmptyInputError(error: unknown): error is EmptyInputError {
  return error instanceof EmptyInputError;
}

export function isDesynchronizedTimestampsError(
  error: unknown
): error is DesynchronizedTimestampsError {
  return error instanceof DesynchronizedTimestampsError;
}

export function isMissingSymbolError(error: unknown): error is MissingSymbolError {
  return error instanceof MissingSymbolError;
}

export function isUndefinedAdjustmentError(error: unknown): error is UndefinedAdjustmentError {
  return error instanceof UndefinedAdjustmentError;
}
