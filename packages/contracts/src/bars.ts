/**
 * @fileoverview A cross-section of bars, one per symbol, at one timestamp.
 *
 * @module @pricebars/contracts/bars
 */

import type { Bar } from './bar.js';
import { DesynchronizedTimestampsError, EmptyInputError, MissingSymbolError } from './errors.js';

/**
 * Input accepted by {@link Bars}: a map or a plain record of symbol to bar.
 */
export type BarDict = ReadonlyMap<string, Bar> | Readonly<Record<string, Bar>>;

function toEntries(barDict: BarDict): Array<[string, Bar]> {
  if (barDict instanceof Map) {
    return [...barDict.entries()];
  }
  return Object.entries(barDict);
}

/**
 * A group of {@link Bar} objects sharing one date time.
 *
 * The symbol mapping is copied at construction and never changes afterwards.
 * The bars themselves are shared with the caller, so session fields set on a
 * bar later are visible through the group.
 *
 * @invariant size > 0
 * @invariant every bar's dateTime equals this.dateTime
 *
 * @example
 * ```typescript
 * const bars = new Bars({ AAPL: aaplBar, MSFT: msftBar });
 * bars.get('AAPL');      // aaplBar
 * bars.getBar('GOOG');   // null
 * bars.get('GOOG');      // throws MissingSymbolError
 * ```
 */
export class Bars {
  private readonly barDict: ReadonlyMap<string, Bar>;
  private readonly _dateTime: Date;

  /**
   * @param barDict - Symbol to bar mapping; must not be empty
   * @throws {EmptyInputError} If no bars are supplied
   * @throws {DesynchronizedTimestampsError} If any two bars have different date times
   */
  constructor(barDict: BarDict) {
    const entries = toEntries(barDict);
    const first = entries[0];
    if (first === undefined) {
      throw new EmptyInputError();
    }

    const [referenceSymbol, referenceBar] = first;
    const reference = referenceBar.dateTime;
    for (const [symbol, bar] of entries) {
      const dateTime = bar.dateTime;
      if (dateTime.getTime() !== reference.getTime()) {
        throw new DesynchronizedTimestampsError(
          `Bar date times are not in sync. ${symbol} ${dateTime.toISOString()} != ` +
            `${referenceSymbol} ${reference.toISOString()}`,
          {
            symbol,
            dateTime: dateTime.toISOString(),
            referenceSymbol,
            referenceDateTime: reference.toISOString(),
          }
        );
      }
    }

    this.barDict = new Map(entries);
    this._dateTime = reference;
  }

  /**
   * Returns the bar for a symbol.
   *
   * @throws {MissingSymbolError} If the symbol is not present
   */
  get(symbol: string): Bar {
    const bar = this.barDict.get(symbol);
    if (bar === undefined) {
      throw new MissingSymbolError(symbol);
    }
    return bar;
  }

  /**
   * Returns the bar for a symbol, or null if it is not present.
   */
  getBar(symbol: string): Bar | null {
    return this.barDict.get(symbol) ?? null;
  }

  has(symbol: string): boolean {
    return this.barDict.has(symbol);
  }

  symbols(): string[] {
    return [...this.barDict.keys()];
  }

  /** Date time shared by every bar in the group */
  get dateTime(): Date {
    return new Date(this._dateTime.getTime());
  }

  get size(): number {
    return this.barDict.size;
  }

  [Symbol.iterator](): Iterator<[string, Bar]> {
    return this.barDict.entries();
  }
}
