/**
 * @fileoverview Winston formats for the pricebars logger.
 */

import { format } from 'winston';

/**
 * Adds an ISO 8601 timestamp and expands Error objects with their stack.
 */
export const standardFields = format.combine(format.timestamp(), format.errors({ stack: true }));

/**
 * Human-readable single-line output for development.
 *
 * @example
 * ```typescript
 * // [2024-03-04T14:30:00.000Z] info: Cross-sections built component=ingest count=3
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'stack' || key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (typeof info['stack'] === 'string') {
      return `${baseMsg}\n${info['stack']}`;
    }

    return baseMsg;
  })
);
