/**
 * @fileoverview Logger factory for pricebars.
 * Creates Winston loggers with structured fields and console, file or stream
 * transports.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * @param config - Logger configuration options
 * @returns Configured Winston logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Records parsed', { count: 120, rejected: 2 });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', json: false, filePath: './logs/ingest.log' });
 * const sessionLogger = logger.child({ component: 'session-boundaries' });
 * sessionLogger.debug('Sessions annotated', { sessions: 5 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stream,
  } = config;

  // Standard fields first, then the output format
  const logFormat = format.combine(standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(new winston.transports.Console({ level }));
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(new winston.transports.Stream({ stream, level }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Nothing to write to
    silent: transports.length === 0,
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries all carry the given context fields.
 *
 * @example
 * ```typescript
 * const ingestLogger = createChildLogger(logger, { component: 'ingest' });
 * ingestLogger.warn('Record rejected', { index: 4 }); // includes component=ingest
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
