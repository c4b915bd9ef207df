/**
 * @fileoverview Tests for logger creation and basic functionality
 */

import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PassThrough } from 'node:stream';
import { createLogger, createChildLogger } from '../src/createLogger.js';
import type { LoggerConfig } from '../src/types.js';

/**
 * Collects everything written to a stream as lines.
 */
function captureStream(): { stream: PassThrough; lines: () => string[] } {
  const stream = new PassThrough();
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf-8')));
  return {
    stream,
    lines: () =>
      chunks
        .join('')
        .split('\n')
        .filter((line) => line.length > 0),
  };
}

// Give Winston time to flush
const flush = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 50));

describe('createLogger', () => {
  const testLogFile = path.join(os.tmpdir(), `pricebars-logger-${process.pid}.log`);

  afterEach(() => {
    if (fs.existsSync(testLogFile)) {
      fs.unlinkSync(testLogFile);
    }
  });

  it('should create a logger with basic configuration', () => {
    const logger = createLogger({ level: 'info', json: true, console: false });

    expect(logger.level).toBe('info');
  });

  it('should create a logger with all log levels', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];

    for (const level of levels) {
      const logger = createLogger({ level, console: false });
      expect(logger.level).toBe(level);
    }
  });

  it('should write JSON entries with a timestamp', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    logger.info('Records parsed', { count: 3 });
    await flush();

    const entries = lines().map((line) => JSON.parse(line));
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe('info');
    expect(entries[0].message).toBe('Records parsed');
    expect(entries[0].count).toBe(3);
    expect(new Date(entries[0].timestamp).toISOString()).toBe(entries[0].timestamp);
  });

  it('should include child logger context', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    createChildLogger(logger, { component: 'ingest', symbol: 'AAPL' }).info('Child log message');
    await flush();

    const entry = JSON.parse(lines()[0] ?? '{}');
    expect(entry.component).toBe('ingest');
    expect(entry.symbol).toBe('AAPL');
  });

  it('should respect log level filtering', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'warn', json: true, console: false, stream });

    logger.debug('Debug message');
    logger.info('Info message');
    logger.warn('Warn message');
    logger.error('Error message');
    await flush();

    const messages = lines().map((line) => JSON.parse(line).message);
    expect(messages).toEqual(['Warn message', 'Error message']);
  });

  it('should render pretty output on one line with context fields', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: false, console: false, stream });

    logger.child({ component: 'session-boundaries' }).info('Sessions annotated', { sessions: 2 });
    await flush();

    const output = lines();
    expect(output).toHaveLength(1);
    expect(output[0]).toMatch(/^\[\S+\] .*info.*: Sessions annotated component=session-boundaries sessions=2$/);
  });

  it('should support file transport', async () => {
    const logger = createLogger({
      level: 'info',
      json: true,
      filePath: testLogFile,
      console: false,
    });

    logger.info('Test message', { foo: 'bar' });
    await new Promise((resolve) => setTimeout(resolve, 100));

    const logContent = fs.readFileSync(testLogFile, 'utf-8');
    expect(logContent).toContain('Test message');
    expect(logContent).toContain('"foo":"bar"');
  });
});
