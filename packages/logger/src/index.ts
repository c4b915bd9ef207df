/**
 * @fileoverview Public API exports for @pricebars/logger
 * Structured logging for the pricebars packages
 */

export { createLogger, createChildLogger } from './createLogger.js';
export { standardFields, prettyPrint } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
