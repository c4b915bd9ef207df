/**
 * @fileoverview Tests for cross-section grouping.
 */

import { describe, it, expect } from 'vitest';
import { Bar } from '@pricebars/contracts';
import { buildCrossSections } from '../src/cross-section.js';
import { DuplicateBarError } from '../src/errors.js';
import type { SymbolBar } from '../src/parser.js';

function entry(symbol: string, iso: string, close = 100): SymbolBar {
  return { symbol, bar: new Bar(new Date(iso), close, close + 1, close - 1, close, 10, close) };
}

describe('buildCrossSections', () => {
  it('should group bars by timestamp in ascending order', () => {
    const { series, symbols, dropped } = buildCrossSections([
      entry('MSFT', '2024-03-04T14:31:00.000Z'),
      entry('AAPL', '2024-03-04T14:30:00.000Z'),
      entry('MSFT', '2024-03-04T14:30:00.000Z'),
      entry('AAPL', '2024-03-04T14:31:00.000Z'),
    ]);

    expect(symbols).toEqual(['AAPL', 'MSFT']);
    expect(dropped).toEqual([]);
    expect(series.map((bars) => bars.dateTime.toISOString())).toEqual([
      '2024-03-04T14:30:00.000Z',
      '2024-03-04T14:31:00.000Z',
    ]);
    expect(series[0]?.symbols().sort()).toEqual(['AAPL', 'MSFT']);
  });

  it('should drop timestamps missing a symbol by default', () => {
    const { series, dropped } = buildCrossSections([
      entry('AAPL', '2024-03-04T14:30:00.000Z'),
      entry('MSFT', '2024-03-04T14:30:00.000Z'),
      entry('AAPL', '2024-03-04T14:31:00.000Z'),
    ]);

    expect(series).toHaveLength(1);
    expect(dropped.map((d) => d.toISOString())).toEqual(['2024-03-04T14:31:00.000Z']);
  });

  it('should keep incomplete timestamps when not requiring all symbols', () => {
    const { series, dropped } = buildCrossSections(
      [
        entry('AAPL', '2024-03-04T14:30:00.000Z'),
        entry('MSFT', '2024-03-04T14:30:00.000Z'),
        entry('AAPL', '2024-03-04T14:31:00.000Z'),
      ],
      { requireAllSymbols: false }
    );

    expect(series).toHaveLength(2);
    expect(series[1]?.symbols()).toEqual(['AAPL']);
    expect(dropped).toEqual([]);
  });

  it('should reject two bars for one symbol at one timestamp', () => {
    expect(() =>
      buildCrossSections([
        entry('AAPL', '2024-03-04T14:30:00.000Z', 100),
        entry('AAPL', '2024-03-04T14:30:00.000Z', 101),
      ])
    ).toThrow(new DuplicateBarError('AAPL', new Date('2024-03-04T14:30:00.000Z')).message);
  });

  it('should return an empty series for no bars', () => {
    expect(buildCrossSections([])).toEqual({ series: [], symbols: [], dropped: [] });
  });
});
