/**
 * @fileoverview Errors raised while turning raw records into bars.
 *
 * @module @pricebars/ingest/errors
 */

import { PriceBarsError } from '@pricebars/contracts';

/**
 * Thrown when a raw record does not match the bar record schema.
 *
 * @example
 * ```typescript
 * throw new RecordValidationError('Invalid bar record', {
 *   issues: ['open: Expected number, received string'],
 * });
 * ```
 */
export class RecordValidationError extends PriceBarsError {
  readonly issues: readonly string[];

  constructor(message: string, data: { issues: string[] }) {
    super('INVALID_RECORD', message, data);
    this.issues = [...data.issues];
  }
}

/**
 * Thrown when two records give a bar for the same symbol and date time.
 */
export class DuplicateBarError extends PriceBarsError {
  constructor(symbol: string, dateTime: Date) {
    super('DUPLICATE_BAR', `Duplicate bar for ${symbol} at ${dateTime.toISOString()}`, {
      symbol,
      dateTime: dateTime.toISOString(),
    });
  }
}

export function isRecordValidationError(error: unknown): error is RecordValidationError {
  return error instanceof RecordValidationError;
}

export function isDuplicateBarError(error: unknown): error is DuplicateBarError {
  return error instanceof DuplicateBarError;
}
