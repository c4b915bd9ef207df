/**
 * @fileoverview Parser utilities for raw bar records.
 *
 * Validates raw records against {@link barRecordSchema} and builds
 * {@link Bar} instances from them.
 *
 * @module @pricebars/ingest/parser
 */

import { Bar, PriceBarsError } from '@pricebars/contracts';
import { barRecordSchema } from './schema.js';
import { RecordValidationError } from './errors.js';

/**
 * A bar together with the symbol it belongs to.
 */
export interface SymbolBar {
  symbol: string;
  bar: Bar;
}

/**
 * A record that could not be turned into a bar.
 */
export interface RejectedRecord {
  /** Position of the record in the input */
  index: number;
  record: unknown;
  error: PriceBarsError;
}

/**
 * Result of parsing a batch of records.
 */
export interface ParseResult {
  bars: SymbolBar[];
  errors: RejectedRecord[];
}

/**
 * Parses a single raw record into a bar.
 *
 * @param raw - Record from a data source
 * @returns Symbol and validated bar
 * @throws {RecordValidationError} If the record does not match the schema
 * @throws {InvariantViolationError} If the prices break the OHLC ordering rules
 *
 * @example
 * ```typescript
 * const { symbol, bar } = parseBarRecord({
 *   symbol: 'SPY',
 *   dateTime: '2024-03-04T14:30:00.000Z',
 *   open: 512.1,
 *   high: 512.6,
 *   low: 511.9,
 *   close: 512.4,
 *   volume: 18250
 * });
 * ```
 */
export function parseBarRecord(raw: unknown): SymbolBar {
  const result = barRecordSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new RecordValidationError(`Invalid bar record:\n${issues.join('\n')}`, { issues });
  }

  const record = result.data;
  return {
    symbol: record.symbol,
    bar: new Bar(
      record.dateTime,
      record.open,
      record.high,
      record.low,
      record.close,
      record.volume,
      record.adjClose ?? record.close
    ),
  };
}

/**
 * Parses a batch of raw records, collecting rejected ones instead of stopping
 * at the first.
 *
 * Only library errors are collected; anything else propagates.
 *
 * @example
 * ```typescript
 * const { bars, errors } = parseBarRecords(rows);
 * logger.info('Records parsed', { parsed: bars.length, rejected: errors.length });
 * ```
 */
export function parseBarRecords(raws: readonly unknown[]): ParseResult {
  const bars: SymbolBar[] = [];
  const errors: RejectedRecord[] = [];

  raws.forEach((raw, index) => {
    try {
      bars.push(parseBarRecord(raw));
    } catch (error) {
      if (!(error instanceof PriceBarsError)) {
        throw error;
      }
      errors.push({ index, record: raw, error });
    }
  });

  return { bars, errors };
}
