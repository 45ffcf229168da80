import { ImportError, errorMessage } from '../errors.js';
import type {
  BatchOutcome,
  ClearedTable,
  Frame,
  ImportDatabase,
  ImportFileInput,
  ImportLogger,
  InsertionOutcome,
  OutcomeErrorCode,
} from '../types/import.js';
import { readGrid } from '../utils/grid.js';
import { normalizeFrame } from '../utils/sentinels.js';
import { downloadFiles, type DownloadOptions, type ManifestEntry } from './download.js';
import { extractFrame } from './frame-extractor.js';
import { createParserRegistry, type ParserRegistry } from './parser-registry.js';
import { pivotFrame } from './pivot-transform.js';
import { failureOutcome, summarizeBatch } from './result.js';
import type { TableParser } from './table-parser.js';

export type ImportContext = {
  database: ImportDatabase;
  registry?: ParserRegistry;
  logger?: ImportLogger;
};

export type BatchOptions = {
  /** Truncates every catalogue table before any file is imported. */
  clearFirst?: boolean;
  /** Table names; files for earlier tables finish before later ones start. */
  tableOrder?: readonly string[];
};

export type RemoteBatchOptions = BatchOptions & {
  download: DownloadOptions;
};

export const consoleLogger: ImportLogger = (level, message) => {
  const line = `[import] ${message}`;
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

const defaultRegistry = createParserRegistry();

function resolve(context: ImportContext): { registry: ParserRegistry; logger: ImportLogger } {
  return { registry: context.registry ?? defaultRegistry, logger: context.logger ?? consoleLogger };
}

function codeFor(error: unknown, fallback: OutcomeErrorCode): OutcomeErrorCode {
  return error instanceof ImportError ? error.code : fallback;
}

function readFrame(parser: TableParser, bytes: Uint8Array): Frame {
  const grid = readGrid(bytes);
  return parser.binding.layout === 'pivot' ? pivotFrame(grid) : extractFrame(grid);
}

async function runFile(
  context: ImportContext,
  registry: ParserRegistry,
  logger: ImportLogger,
  filename: string,
  bytes: Uint8Array
): Promise<InsertionOutcome> {
  let parser: TableParser;
  try {
    parser = registry.select(filename);
  } catch (error) {
    return failureOutcome({ filename, errors: [errorMessage(error)], error_code: codeFor(error, 'unsupported_filename') });
  }
  const table_name = parser.binding.table.name;

  let frame: Frame;
  try {
    frame = normalizeFrame(readFrame(parser, bytes));
  } catch (error) {
    return failureOutcome({ filename, table_name, errors: [errorMessage(error)], error_code: codeFor(error, 'structural') });
  }
  if (!frame.records.length) {
    return failureOutcome({ filename, table_name, errors: ['no data rows to import'], error_code: 'structural' });
  }

  let cleaned: Frame;
  try {
    const validation = parser.validate(frame);
    if (!validation.valid) {
      return failureOutcome({
        filename,
        table_name,
        total_rows: frame.records.length,
        errors: validation.errors,
        error_code: 'validation_failed',
      });
    }
    cleaned = parser.clean(frame);
  } catch (error) {
    return failureOutcome({
      filename,
      table_name,
      total_rows: frame.records.length,
      errors: [errorMessage(error)],
      error_code: codeFor(error, 'validation_failed'),
    });
  }

  try {
    return await context.database.transaction((session) => parser.insert(cleaned, session, { filename, logger }));
  } catch (error) {
    return failureOutcome({
      filename,
      table_name,
      total_rows: cleaned.records.length,
      errors: [errorMessage(error)],
      error_code: 'storage',
    });
  }
}

function logOutcome(logger: ImportLogger, outcome: InsertionOutcome): void {
  if (outcome.success) {
    logger(
      'info',
      `${outcome.filename} -> ${outcome.table_name}: ${outcome.inserted_count} inserted, ${outcome.updated_count} updated`
    );
  } else {
    logger('error', `${outcome.filename} failed (${outcome.error_code}): ${outcome.errors.join('; ')}`);
  }
}

/**
 * Imports one workbook. Never rejects: every failure, including storage
 * errors, comes back as an unsuccessful outcome with nothing written.
 */
export async function importFile(
  context: ImportContext,
  filename: string,
  bytes: Uint8Array
): Promise<InsertionOutcome> {
  const { registry, logger } = resolve(context);
  const outcome = await runFile(context, registry, logger, filename, bytes);
  logOutcome(logger, outcome);
  return outcome;
}

export async function clearTables(context: ImportContext): Promise<Record<string, ClearedTable>> {
  const { registry, logger } = resolve(context);
  const tables = registry.tables();
  const report = await context.database.transaction(async (session) => {
    const cleared: Record<string, ClearedTable> = {};
    for (const table of tables) {
      const before = await session.count(table);
      await session.clear(table);
      cleared[table.name] = { before, after: await session.count(table) };
    }
    return cleared;
  });
  for (const [table, counts] of Object.entries(report)) {
    logger('warn', `cleared ${table}: ${counts.before} -> ${counts.after} rows`);
  }
  return report;
}

function stagesFor(
  registry: ParserRegistry,
  files: readonly ImportFileInput[],
  tableOrder: readonly string[] | undefined
): number[][] {
  const indexes = files.map((_, index) => index);
  if (!tableOrder?.length) return [indexes];

  const stages: number[][] = tableOrder.map(() => []);
  const rest: number[] = [];
  for (const index of indexes) {
    const table = registry.match(files[index].filename)?.binding.table.name;
    const position = table === undefined ? -1 : tableOrder.indexOf(table);
    if (position === -1) rest.push(index);
    else stages[position].push(index);
  }
  return [...stages, rest].filter((stage) => stage.length > 0);
}

/**
 * Imports many workbooks. Files in the same stage run concurrently, each in
 * its own transaction; results keep the input order.
 */
export async function importBatch(
  context: ImportContext,
  files: readonly ImportFileInput[],
  options: BatchOptions = {}
): Promise<BatchOutcome> {
  const { registry } = resolve(context);
  const cleared = options.clearFirst ? await clearTables(context) : undefined;

  const results: InsertionOutcome[] = [];
  for (const stage of stagesFor(registry, files, options.tableOrder)) {
    const outcomes = await Promise.all(
      stage.map((index) => importFile(context, files[index].filename, files[index].bytes))
    );
    stage.forEach((index, position) => {
      results[index] = outcomes[position];
    });
  }

  return summarizeBatch(results, cleared);
}

/** Downloads a manifest, then imports whatever arrived; failed downloads are reported per file. */
export async function importRemoteBatch(
  context: ImportContext,
  manifest: readonly ManifestEntry[],
  options: RemoteBatchOptions
): Promise<BatchOutcome> {
  const { registry, logger } = resolve(context);
  const downloads = await downloadFiles(manifest, options.download);

  const files: ImportFileInput[] = [];
  for (const download of downloads) {
    if (download.ok) files.push({ filename: download.name, bytes: download.bytes });
  }
  const batch = await importBatch(context, files, options);

  let next = 0;
  const results = downloads.map((download): InsertionOutcome => {
    if (download.ok) {
      const outcome = batch.results[next];
      next += 1;
      return outcome;
    }
    const outcome = failureOutcome({
      filename: download.name,
      table_name: registry.match(download.name)?.binding.table.name ?? '',
      errors: [download.error],
      error_code: 'download',
    });
    logOutcome(logger, outcome);
    return outcome;
  });

  return summarizeBatch(results, batch.cleared_tables);
}
