/**
 * @fileoverview Tests for configuration loading.
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, toLoggerConfig } from '../src/config/index.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      logging: { level: 'info', format: 'pretty' },
      ingest: { strict: false, requireAllSymbols: true, annotateSessions: true },
    });
  });

  it('should read settings from environment variables', () => {
    const config = loadConfig({
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
      LOG_FILE: './logs/ingest.log',
      INGEST_STRICT: 'true',
      INGEST_REQUIRE_ALL_SYMBOLS: 'false',
    });

    expect(config.logging).toEqual({ level: 'debug', format: 'json', filePath: './logs/ingest.log' });
    expect(config.ingest).toEqual({ strict: true, requireAllSymbols: false, annotateSessions: true });
  });

  it('should list every invalid setting', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose', INGEST_STRICT: 'yes' })).toThrow(
      /^Configuration validation failed:\nlogging\.level: .+\ningest\.strict: .+$/
    );
  });
});

describe('toLoggerConfig', () => {
  it('should map the logging section', () => {
    const config = loadConfig({ LOG_FORMAT: 'json', LOG_LEVEL: 'warn' });

    expect(toLoggerConfig(config)).toEqual({ level: 'warn', json: true, filePath: undefined });
  });
});
