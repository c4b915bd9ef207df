/**
 * @fileoverview Tests for the ingestion pipeline.
 */

import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { createLogger, type Logger } from '@pricebars/logger';
import { ingestRecords } from '../src/pipeline.js';
import { RecordValidationError } from '../src/errors.js';
import type { IngestConfig } from '../src/config/schema.js';

const defaults: IngestConfig = { strict: false, requireAllSymbols: true, annotateSessions: true };

function record(symbol: string, dateTime: string, close: number): Record<string, unknown> {
  return { symbol, dateTime, open: close, high: close + 1, low: close - 1, close, volume: 100 };
}

const records = [
  record('AAPL', '2024-03-04T14:30:00.000Z', 170),
  record('MSFT', '2024-03-04T14:30:00.000Z', 410),
  record('AAPL', '2024-03-04T14:31:00.000Z', 171),
  record('MSFT', '2024-03-04T14:31:00.000Z', 411),
  record('AAPL', '2024-03-05T14:30:00.000Z', 172),
  record('MSFT', '2024-03-05T14:30:00.000Z', 412),
  { symbol: 'MSFT', dateTime: '2024-03-05T14:31:00.000Z', open: 'n/a' },
];

function captureLogger(): { logger: Logger; entries: () => Array<Record<string, unknown>> } {
  const stream = new PassThrough();
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf-8')));
  return {
    logger: createLogger({ level: 'debug', json: true, console: false, stream }),
    entries: () =>
      chunks
        .join('')
        .split('\n')
        .filter((line) => line.length > 0)
        .map((line) => JSON.parse(line)),
  };
}

const flush = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 50));

describe('ingestRecords', () => {
  it('should build annotated cross-sections and report rejected records', () => {
    const logger = createLogger({ level: 'info', console: false });
    const result = ingestRecords(records, { config: defaults, logger });

    expect(result.series).toHaveLength(3);
    expect(result.rejected.map((r) => r.index)).toEqual([6]);
    expect(result.rejected[0]?.error).toBeInstanceOf(RecordValidationError);
    expect(result.dropped).toEqual([]);
    expect(result.sessions).toBe(4);

    const [first, second, third] = result.series;
    expect(first?.get('AAPL').barsUntilSessionClose).toBe(1);
    expect(second?.get('MSFT').sessionClose).toBe(true);
    expect(third?.get('AAPL').sessionClose).toBe(true);
  });

  it('should leave session fields unset when annotation is disabled', () => {
    const logger = createLogger({ level: 'info', console: false });
    const result = ingestRecords(records, {
      config: { ...defaults, annotateSessions: false },
      logger,
    });

    expect(result.sessions).toBeNull();
    expect(result.series[1]?.get('MSFT').sessionClose).toBe(false);
    expect(result.series[1]?.get('MSFT').barsUntilSessionClose).toBeNull();
  });

  it('should throw the first rejection in strict mode', () => {
    const logger = createLogger({ level: 'info', console: false });

    expect(() =>
      ingestRecords(records, { config: { ...defaults, strict: true }, logger })
    ).toThrow(RecordValidationError);
  });

  it('should log rejections and a summary', async () => {
    const { logger, entries } = captureLogger();

    ingestRecords(records, { config: defaults, logger });
    await flush();

    const logged = entries();
    const warning = logged.find((e) => e['message'] === 'Record rejected');
    const summary = logged.find((e) => e['message'] === 'Records ingested');

    expect(warning?.['component']).toBe('ingest');
    expect(warning?.['index']).toBe(6);
    expect(warning?.['error_code']).toBe('INVALID_RECORD');
    expect(summary).toMatchObject({
      count: 7,
      parsed: 6,
      rejected: 1,
      symbols: 2,
      crossSections: 3,
      dropped: 0,
      sessions: 4,
    });
  });
});
