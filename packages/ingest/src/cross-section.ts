/**
 * @fileoverview Groups per-symbol bars into synchronized cross-sections.
 *
 * @module @pricebars/ingest/cross-section
 */

import { Bars, type Bar } from '@pricebars/contracts';
import type { Logger } from '@pricebars/logger';
import { DuplicateBarError } from './errors.js';
import type { SymbolBar } from './parser.js';

export interface CrossSectionOptions {
  /**
   * Drop timestamps at which any symbol of the input has no bar.
   * @default true
   */
  requireAllSymbols?: boolean;
  logger?: Logger;
}

export interface CrossSectionResult {
  /** One cross-section per kept timestamp, ascending */
  series: Bars[];
  /** Every symbol seen in the input, sorted */
  symbols: string[];
  /** Timestamps dropped for missing symbols, ascending */
  dropped: Date[];
}

/**
 * Builds one {@link Bars} per distinct timestamp.
 *
 * @throws {DuplicateBarError} If a symbol has two bars at the same timestamp
 *
 * @example
 * ```typescript
 * const { series, dropped } = buildCrossSections(parseBarRecords(rows).bars);
 * series[0].symbols(); // ['AAPL', 'MSFT']
 * ```
 */
export function buildCrossSections(
  symbolBars: readonly SymbolBar[],
  options: CrossSectionOptions = {}
): CrossSectionResult {
  const { requireAllSymbols = true, logger } = options;

  const groups = new Map<number, Map<string, Bar>>();
  const symbols = new Set<string>();

  for (const { symbol, bar } of symbolBars) {
    const time = bar.dateTime.getTime();
    let group = groups.get(time);
    if (group === undefined) {
      group = new Map<string, Bar>();
      groups.set(time, group);
    }
    if (group.has(symbol)) {
      throw new DuplicateBarError(symbol, bar.dateTime);
    }
    group.set(symbol, bar);
    symbols.add(symbol);
  }

  const allSymbols = [...symbols].sort();
  const series: Bars[] = [];
  const dropped: Date[] = [];

  for (const time of [...groups.keys()].sort((a, b) => a - b)) {
    const group = groups.get(time);
    if (group === undefined) {
      continue;
    }
    if (requireAllSymbols && group.size < allSymbols.length) {
      const dateTime = new Date(time);
      dropped.push(dateTime);
      logger?.warn('Dropping incomplete cross-section', {
        dateTime: dateTime.toISOString(),
        missing: allSymbols.filter((symbol) => !group.has(symbol)),
      });
      continue;
    }
    series.push(new Bars(group));
  }

  return { series, symbols: allSymbols, dropped };
}
