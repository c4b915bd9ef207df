/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

/**
 * Ingest configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional()
    })
    .default({}),

  ingest: z
    .object({
      // Throw on the first rejected record instead of collecting them
      strict: z.boolean().default(false),
      requireAllSymbols: z.boolean().default(true),
      annotateSessions: z.boolean().default(true)
    })
    .default({})
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

export type IngestConfig = Config['ingest'];

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  'LOG_LEVEL': 'logging.level',
  'LOG_FORMAT': 'logging.format',
  'LOG_FILE': 'logging.filePath',
  'INGEST_STRICT': 'ingest.strict',
  'INGEST_REQUIRE_ALL_SYMBOLS': 'ingest.requireAllSymbols',
  'INGEST_ANNOTATE_SESSIONS': 'ingest.annotateSessions'
};
