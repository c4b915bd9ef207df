/**
 * @fileoverview Ingestion pipeline: raw records to annotated cross-sections.
 *
 * @module @pricebars/ingest/pipeline
 */

import type { Bars } from '@pricebars/contracts';
import { createChildLogger, type Logger } from '@pricebars/logger';
import { annotateCrossSections, type SessionKeyFn } from '@pricebars/session-boundaries';
import type { IngestConfig } from './config/schema.js';
import { buildCrossSections } from './cross-section.js';
import { parseBarRecords, type RejectedRecord } from './parser.js';

export interface IngestOptions {
  config: IngestConfig;
  logger: Logger;
  /** Session key passed to the session-boundary scan */
  sessionKey?: SessionKeyFn;
}

export interface IngestResult {
  /** Cross-sections in ascending date-time order */
  series: Bars[];
  /** Records that could not be turned into bars */
  rejected: RejectedRecord[];
  /** Timestamps dropped for missing symbols */
  dropped: Date[];
  /** Sessions found, or null when annotation is disabled */
  sessions: number | null;
}

/**
 * Parses raw records, groups them into cross-sections and marks session
 * boundaries.
 *
 * @throws {PriceBarsError} In strict mode, the first rejected record's error
 * @throws {DuplicateBarError} If a symbol has two bars at one timestamp
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const logger = createLogger(toLoggerConfig(config));
 * const { series, rejected } = ingestRecords(rows, { config: config.ingest, logger });
 * ```
 */
export function ingestRecords(records: readonly unknown[], options: IngestOptions): IngestResult {
  const { config, sessionKey } = options;
  const logger = createChildLogger(options.logger, { component: 'ingest' });

  const { bars, errors } = parseBarRecords(records);

  const firstRejected = errors[0];
  if (config.strict && firstRejected !== undefined) {
    logger.error('Record rejected in strict mode', {
      index: firstRejected.index,
      error_code: firstRejected.error.code,
    });
    throw firstRejected.error;
  }

  for (const rejected of errors) {
    logger.warn('Record rejected', {
      index: rejected.index,
      error_code: rejected.error.code,
      reason: rejected.error.message,
    });
  }

  const { series, symbols, dropped } = buildCrossSections(bars, {
    requireAllSymbols: config.requireAllSymbols,
    logger,
  });

  const sessions = config.annotateSessions
    ? annotateCrossSections(series, { sessionKey, logger }).sessions
    : null;

  logger.info('Records ingested', {
    count: records.length,
    parsed: bars.length,
    rejected: errors.length,
    symbols: symbols.length,
    crossSections: series.length,
    dropped: dropped.length,
    sessions,
  });

  return { series, rejected: errors, dropped, sessions };
}
