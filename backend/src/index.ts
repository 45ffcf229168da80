export * from './types/import.js';
export { ImportError, type ImportErrorCode } from './errors.js';
export { loadConfig, type AppConfig, type DatabaseConfig, type ImportConfig } from './config.js';
export { createPool, createPgDatabase, ensureSchema, withTransaction } from './db.js';
export { createTableSql } from './services/schema.js';
export { normalizeFrame, isSentinel } from './utils/sentinels.js';
export { toIsoDate, excelSerialToDate, dateToExcelSerial } from './utils/excel-date.js';
export { readGrid } from './utils/grid.js';
export { extractFrame } from './services/frame-extractor.js';
export { pivotFrame } from './services/pivot-transform.js';
export {
  defineTableParser,
  type TableParser,
  type ParserBinding,
  type ParserHooks,
  type ValidationIssue,
  type ValidationOutcome,
} from './services/table-parser.js';
export { tableParsers } from './services/parsers/index.js';
export { createParserRegistry, type ParserRegistry } from './services/parser-registry.js';
export { successOutcome, failureOutcome, summarizeBatch } from './services/result.js';
export { parseManifest, downloadFiles, type ManifestEntry, type DownloadOptions } from './services/download.js';
export {
  importFile,
  importBatch,
  importRemoteBatch,
  clearTables,
  consoleLogger,
  type ImportContext,
  type BatchOptions,
} from './services/importer.js';
