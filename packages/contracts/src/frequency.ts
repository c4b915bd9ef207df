/**
 * @fileoverview Sampling frequencies for bar sequences.
 *
 * Sub-day frequencies carry their length in minutes; day, week and month are
 * symbolic tags. Both lookup directions are built from one list of pairs.
 *
 * @module @pricebars/contracts/frequency
 */

import { UnknownFrequencyError } from './errors.js';

/**
 * Supported sampling intervals.
 *
 * @invariant Intraday values are minute counts, ordered smallest to largest
 */
export enum Frequency {
  Minute = 1,
  Five = 5,
  Ten = 10,
  Fifteen = 15,
  Thirty = 30,
  Hour = 60,
  Day = 'd',
  Week = 'w',
  Month = 'm',
}

/**
 * Display name of a frequency.
 */
export type FrequencyName =
  | 'minute'
  | 'five-minute'
  | 'ten-minute'
  | 'fifteen-minute'
  | 'thirty-minute'
  | 'hour'
  | 'day'
  | 'week'
  | 'month';

/**
 * Source of truth for both lookup tables, in ascending duration.
 *
 * @internal
 */
const FREQUENCY_NAMES: ReadonlyArray<readonly [Frequency, FrequencyName]> = [
  [Frequency.Minute, 'minute'],
  [Frequency.Five, 'five-minute'],
  [Frequency.Ten, 'ten-minute'],
  [Frequency.Fifteen, 'fifteen-minute'],
  [Frequency.Thirty, 'thirty-minute'],
  [Frequency.Hour, 'hour'],
  [Frequency.Day, 'day'],
  [Frequency.Week, 'week'],
  [Frequency.Month, 'month'],
];

const NAME_BY_FREQUENCY: ReadonlyMap<Frequency, FrequencyName> = new Map<Frequency, FrequencyName>(
  FREQUENCY_NAMES
);

const FREQUENCY_BY_NAME: ReadonlyMap<string, Frequency> = new Map<string, Frequency>(
  FREQUENCY_NAMES.map(([frequency, name]) => [name, frequency] as const)
);

/**
 * Checks whether a value is one of the defined frequency tokens.
 *
 * @example
 * ```typescript
 * isValidFrequency(15)    // true
 * isValidFrequency('d')   // true
 * isValidFrequency(7)     // false
 * ```
 */
export function isValidFrequency(value: unknown): value is Frequency {
  return FREQUENCY_NAMES.some(([frequency]) => frequency === value);
}

/**
 * Checks whether a string is one of the frequency display names.
 */
export function isFrequencyName(value: string): value is FrequencyName {
  return FREQUENCY_BY_NAME.has(value);
}

/**
 * Returns the display name for a frequency token.
 *
 * @throws {UnknownFrequencyError} If the token is not defined
 *
 * @example
 * ```typescript
 * frequencyToName(Frequency.Five)  // 'five-minute'
 * frequencyToName(Frequency.Week)  // 'week'
 * ```
 */
export function frequencyToName(frequency: Frequency): FrequencyName {
  const name = NAME_BY_FREQUENCY.get(frequency);
  if (name === undefined) {
    throw new UnknownFrequencyError(frequency);
  }
  return name;
}

/**
 * Returns the frequency token for a display name.
 *
 * @throws {UnknownFrequencyError} If the name is not defined
 *
 * @example
 * ```typescript
 * nameToFrequency('hour')  // Frequency.Hour
 * nameToFrequency('15m')   // throws
 * ```
 */
export function nameToFrequency(name: string): Frequency {
  const frequency = FREQUENCY_BY_NAME.get(name);
  if (frequency === undefined) {
    throw new UnknownFrequencyError(name);
  }
  return frequency;
}

/**
 * True for the minute-based frequencies.
 */
export function isIntradayFrequency(frequency: Frequency): boolean {
  return typeof frequency === 'number';
}

/**
 * Length of an intraday frequency in minutes, or null for day, week and month.
 */
export function frequencyToMinutes(frequency: Frequency): number | null {
  return typeof frequency === 'number' ? frequency : null;
}

/**
 * All frequencies from shortest to longest.
 */
export function getAllFrequencies(): Frequency[] {
  return FREQUENCY_NAMES.map(([frequency]) => frequency);
}
