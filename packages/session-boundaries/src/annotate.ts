/**
 * Session-boundary scan over chronological bar sequences.
 *
 * Fills in the two mutable fields of each {@link Bar}: whether it closes its
 * session, and how many bars remain until the session closes.
 *
 * @packageDocumentation
 */

import type { Bar, Bars } from '@pricebars/contracts';
import type { Logger } from '@pricebars/logger';
import { UnorderedBarsError } from './errors.js';
import { utcSessionKey, type SessionKeyFn } from './session-key.js';

export interface AnnotateOptions {
  /** Session identifier for a timestamp. Defaults to the UTC calendar date. */
  sessionKey?: SessionKeyFn;
  logger?: Logger;
}

export interface AnnotationSummary {
  /** Number of bars annotated */
  bars: number;
  /** Number of sessions found */
  sessions: number;
}

export interface CrossSectionAnnotationSummary extends AnnotationSummary {
  /** Number of distinct symbols scanned */
  symbols: number;
}

function assertAscending(dateTimes: readonly Date[]): void {
  for (let i = 1; i < dateTimes.length; i++) {
    const previous = dateTimes[i - 1];
    const current = dateTimes[i];
    if (previous === undefined || current === undefined) {
      continue;
    }
    if (current.getTime() <= previous.getTime()) {
      throw new UnorderedBarsError(
        `Bars are not in ascending order: ${current.toISOString()} at index ${i} ` +
          `follows ${previous.toISOString()}`,
        { index: i, previous: previous.toISOString(), current: current.toISOString() }
      );
    }
  }
}

function markSession(session: readonly Bar[]): void {
  const last = session.length - 1;
  session.forEach((bar, i) => {
    bar.setBarsUntilSessionClose(last - i);
    bar.setSessionClose(i === last);
  });
}

function annotateSequence(bars: readonly Bar[], sessionKey: SessionKeyFn): number {
  let sessions = 0;
  let current: Bar[] = [];
  let currentKey: string | null = null;

  for (const bar of bars) {
    const key = sessionKey(bar.dateTime);
    if (currentKey !== null && key !== currentKey) {
      markSession(current);
      sessions++;
      current = [];
    }
    currentKey = key;
    current.push(bar);
  }

  if (current.length > 0) {
    markSession(current);
    sessions++;
  }

  return sessions;
}

/**
 * Annotates a chronological sequence of bars for one instrument.
 *
 * Consecutive bars sharing a session key form a session. Within a session of
 * n bars, bar i gets a countdown of n - 1 - i and only the last bar is marked
 * as the session close. Ordering is checked before any bar is touched.
 *
 * @throws {UnorderedBarsError} If the date times are not strictly ascending
 *
 * @example
 * ```typescript
 * const summary = annotateSessionBoundaries(spyBars);
 * spyBars[spyBars.length - 1].sessionClose; // true
 * ```
 */
export function annotateSessionBoundaries(
  bars: readonly Bar[],
  options: AnnotateOptions = {}
): AnnotationSummary {
  const sessionKey = options.sessionKey ?? utcSessionKey;
  assertAscending(bars.map((bar) => bar.dateTime));

  const sessions = annotateSequence(bars, sessionKey);

  options.logger?.debug('Session boundaries annotated', { bars: bars.length, sessions });
  return { bars: bars.length, sessions };
}

/**
 * Annotates every instrument of a chronological series of cross-sections.
 *
 * Each symbol is scanned on its own, so a symbol missing from the last
 * cross-section of a day gets its own last bar of that day marked.
 *
 * @throws {UnorderedBarsError} If the cross-sections are not strictly ascending
 */
export function annotateCrossSections(
  series: readonly Bars[],
  options: AnnotateOptions = {}
): CrossSectionAnnotationSummary {
  const sessionKey = options.sessionKey ?? utcSessionKey;
  assertAscending(series.map((bars) => bars.dateTime));

  const bySymbol = new Map<string, Bar[]>();
  for (const bars of series) {
    for (const [symbol, bar] of bars) {
      const sequence = bySymbol.get(symbol);
      if (sequence === undefined) {
        bySymbol.set(symbol, [bar]);
      } else {
        sequence.push(bar);
      }
    }
  }

  let barCount = 0;
  let sessions = 0;
  for (const sequence of bySymbol.values()) {
    barCount += sequence.length;
    sessions += annotateSequence(sequence, sessionKey);
  }

  const summary = { bars: barCount, sessions, symbols: bySymbol.size };
  options.logger?.debug('Cross-section session boundaries annotated', summary);
  return summary;
}
