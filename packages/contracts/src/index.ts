/**
 * @fileoverview Main entry point for @pricebars/contracts.
 *
 * Exports the price-bar data model: frequencies, bars, cross-sections and
 * the error taxonomy.
 *
 * @module @pricebars/contracts
 */

// Frequencies
export {
  Frequency,
  isValidFrequency,
  isFrequencyName,
  frequencyToName,
  nameToFrequency,
  isIntradayFrequency,
  frequencyToMinutes,
  getAllFrequencies,
} from './frequency.js';
export type { FrequencyName } from './frequency.js';

// Bars
export { Bar } from './bar.js';
export type { BarFields } from './bar.js';
export { Bars } from './bars.js';
export type { BarDict } from './bars.js';

// Error classes and guards
export {
  PriceBarsError,
  InvariantViolationError,
  InvalidBarInputError,
  EmptyInputError,
  DesynchronizedTimestampsError,
  MissingSymbolError,
  UndefinedAdjustmentError,
  UnknownFrequencyError,
  isPriceBarsError,
  isInvariantViolationError,
  isEmptyInputError,
  isDesynchronizedTimestampsError,
  isMissingSymbolError,
  isUndefinedAdjustmentError,
} from './errors.js';
export type { BarRule } from './errors.js';
