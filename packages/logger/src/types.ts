/**
 * @fileoverview Type definitions for the pricebars logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity of messages that will be logged.
 * - 'error': Failures the caller must look at
 * - 'warn': Rejected records, dropped cross-sections
 * - 'info': Pipeline summaries
 * - 'debug': Per-step detail
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/ingest.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs as JSON lines.
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path; logs are written there in addition to the console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Optional writable stream that receives every formatted entry.
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Fields attached to every entry of a child logger.
 *
 * @example
 * ```typescript
 * const sessionLogger = logger.child({ component: 'session-boundaries' });
 * ```
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g. 'ingest', 'session-boundaries') */
  component?: string;

  /** Instrument symbol context */
  symbol?: string;

  /** Frequency display name context (e.g. 'five-minute') */
  frequency?: string;

  [key: string]: unknown;
}

export type Logger = WinstonLogger;
