/**
 * Configuration loading and management
 */

import type { Logger, LoggerConfig } from '@pricebars/logger';
import { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = Record<string, unknown>;

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from environment and defaults
 *
 * @throws {Error} Listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined) {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  if (logger) {
    logger.info('Configuration loaded', {
      logLevel: result.data.logging.level,
      strict: result.data.ingest.strict,
      requireAllSymbols: result.data.ingest.requireAllSymbols,
      annotateSessions: result.data.ingest.annotateSessions
    });
  }

  return result.data;
}

/**
 * Logger settings for a loaded configuration
 */
export function toLoggerConfig(config: Config): LoggerConfig {
  return {
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath
  };
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  let current = obj;

  for (const key of keys.slice(0, -1)) {
    const next = current[key];
    if (isRawConfig(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  const lastKey = keys[keys.length - 1];
  if (lastKey) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): boolean | number | string {
  // Boolean
  if (value === 'true') return true;
  if (value === 'false') return false;

  // Number
  const num = Number(value);
  if (!isNaN(num) && value !== '') return num;

  // String
  return value;
}

export { configSchema, envMapping } from './schema.js';
export type { Config, IngestConfig } from './schema.js';
