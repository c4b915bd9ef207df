/**
 * @fileoverview Public API for @pricebars/ingest.
 *
 * Turns raw price records into validated bars, groups them into synchronized
 * cross-sections and marks session boundaries.
 *
 * @module @pricebars/ingest
 */

export { barRecordSchema } from './schema.js';
export type { BarRecord, BarRecordInput } from './schema.js';

export { parseBarRecord, parseBarRecords } from './parser.js';
export type { SymbolBar, RejectedRecord, ParseResult } from './parser.js';

export { buildCrossSections } from './cross-section.js';
export type { CrossSectionOptions, CrossSectionResult } from './cross-section.js';

export { ingestRecords } from './pipeline.js';
export type { IngestOptions, IngestResult } from './pipeline.js';

export { loadConfig, toLoggerConfig, configSchema, envMapping } from './config/index.js';
export type { Config, IngestConfig } from './config/index.js';

export {
  RecordValidationError,
  DuplicateBarError,
  isRecordValidationError,
  isDuplicateBarError,
} from './errors.js';
