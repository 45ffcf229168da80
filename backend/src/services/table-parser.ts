import { storageError, errorMessage } from '../errors.js';
import type {
  CellValue,
  ColumnDefinition,
  ColumnKind,
  Frame,
  FrameRecord,
  ImportLogger,
  ImportSession,
  InsertionOutcome,
  TableDefinition,
} from '../types/import.js';
import { isFlag, isNumeric, roundTo, toFlag, toFloat, toInteger } from '../utils/coerce.js';
import { toIsoDate } from '../utils/excel-date.js';
import { successOutcome } from './result.js';

export type SheetLayout = 'metadata' | 'pivot';

export type DuplicatePolicy = 'reject' | 'keep-last';

export type ParserBinding = {
  table: TableDefinition;
  /** Lowercase substring matched against the file name. */
  pattern: string;
  layout: SheetLayout;
  required: string[];
  duplicatePolicy: DuplicatePolicy;
};

export type ValidationIssueKind =
  | 'missing_column'
  | 'null_primary_key'
  | 'duplicate_key'
  | 'type_coercion'
  | 'invalid_value';

export type ValidationIssue = {
  kind: ValidationIssueKind;
  message: string;
};

export type ValidationOutcome = {
  valid: boolean;
  errors: string[];
  issues: ValidationIssue[];
};

export class IssueCollector {
  private readonly issues: ValidationIssue[] = [];

  add(kind: ValidationIssueKind, message: string): void {
    this.issues.push({ kind, message });
  }

  outcome(): ValidationOutcome {
    return {
      valid: this.issues.length === 0,
      errors: this.issues.map((issue) => issue.message),
      issues: [...this.issues],
    };
  }
}

export type ParserHooks = {
  /** Filled in when the column is absent or the cell is null. */
  defaults?: Record<string, CellValue>;
  /** Column name to decimal places. */
  rounding?: Record<string, number>;
  validateRecord?: (record: FrameRecord, row: number, issues: IssueCollector) => void;
  /** Return null to drop the record. */
  cleanRecord?: (record: FrameRecord) => FrameRecord | null;
};

export type InsertOptions = {
  filename: string;
  logger?: ImportLogger;
};

export interface TableParser {
  readonly binding: ParserBinding;
  validate(frame: Frame): ValidationOutcome;
  clean(frame: Frame): Frame;
  insert(frame: Frame, session: ImportSession, options: InsertOptions): Promise<InsertionOutcome>;
}

const NUMERIC_KINDS: readonly ColumnKind[] = ['int', 'float'];

export function workbookName(binding: ParserBinding): string {
  return `${binding.table.name}.xlsx`;
}

function describeValue(value: CellValue): string {
  return typeof value === 'string' ? `"${value}"` : String(value);
}

function keyOf(record: FrameRecord, primaryKey: readonly string[]): string | null {
  const parts: CellValue[] = [];
  for (const column of primaryKey) {
    const value = record[column];
    if (value == null) return null;
    parts.push(value);
  }
  return JSON.stringify(parts);
}

function describeKey(record: FrameRecord, primaryKey: readonly string[]): string {
  return primaryKey.map((column) => `${column}=${describeValue(record[column] ?? null)}`).join(', ');
}

function coerceColumn(column: ColumnDefinition, value: CellValue): CellValue {
  if (value == null) return null;
  switch (column.kind) {
    case 'int':
      return toInteger(value);
    case 'float':
      return toFloat(value);
    case 'flag':
      return toFlag(value);
    case 'date':
      return toIsoDate(value);
    default:
      return String(value);
  }
}

function validateFrame(binding: ParserBinding, hooks: ParserHooks, frame: Frame): ValidationOutcome {
  const { table, required, duplicatePolicy } = binding;
  const issues = new IssueCollector();
  const present = new Set(frame.columns);

  const expected = [...new Set([...table.primaryKey, ...required])];
  for (const column of expected) {
    if (!present.has(column)) {
      issues.add('missing_column', `missing required column ${column}`);
    }
  }
  const keyComplete = table.primaryKey.every((column) => present.has(column));

  const known = table.columns.filter((column) => present.has(column.name));
  const definitions = new Map(table.columns.map((column) => [column.name, column]));
  const seen = new Map<string, number>();

  frame.records.forEach((record, index) => {
    const row = index + 1;

    if (keyComplete) {
      const nullKeys = table.primaryKey.filter((column) => record[column] == null);
      for (const column of nullKeys) {
        issues.add('null_primary_key', `row ${row}: primary key ${column} is empty`);
      }
      // keys compare as stored: "01" and "1" collide in an int column
      const stored: FrameRecord = {};
      for (const column of table.primaryKey) {
        const definition = definitions.get(column);
        const value = record[column] ?? null;
        stored[column] = definition ? coerceColumn(definition, value) : value;
      }
      const key = nullKeys.length ? null : keyOf(stored, table.primaryKey);
      if (key !== null && duplicatePolicy === 'reject') {
        const first = seen.get(key);
        if (first === undefined) {
          seen.set(key, row);
        } else {
          issues.add(
            'duplicate_key',
            `row ${row}: duplicate primary key (${describeKey(stored, table.primaryKey)}) first seen in row ${first}`
          );
        }
      }
    }

    for (const column of known) {
      const value = record[column.name];
      if (value == null) continue;
      if (NUMERIC_KINDS.includes(column.kind) && !isNumeric(value)) {
        issues.add('type_coercion', `row ${row}: column ${column.name} expects a number, got ${describeValue(value)}`);
      } else if (column.kind === 'flag' && !isFlag(value)) {
        issues.add('type_coercion', `row ${row}: column ${column.name} expects 0 or 1, got ${describeValue(value)}`);
      } else if (column.kind === 'varchar' && column.length !== undefined && String(value).length > column.length) {
        issues.add(
          'invalid_value',
          `row ${row}: column ${column.name} exceeds ${column.length} characters`
        );
      }
    }

    hooks.validateRecord?.(record, row, issues);
  });

  return issues.outcome();
}

function cleanFrame(binding: ParserBinding, hooks: ParserHooks, frame: Frame): Frame {
  const { table } = binding;
  const defaults = hooks.defaults ?? {};
  const rounding = hooks.rounding ?? {};

  const columns = [...frame.columns];
  for (const column of Object.keys(defaults)) {
    if (!columns.includes(column)) columns.push(column);
  }
  const definitions = new Map(table.columns.map((column) => [column.name, column]));

  const cleaned: FrameRecord[] = [];
  for (const source of frame.records) {
    let record: FrameRecord = {};
    for (const column of columns) {
      const definition = definitions.get(column);
      const value = source[column] ?? null;
      record[column] = definition ? coerceColumn(definition, value) : value;
    }
    for (const [column, fallback] of Object.entries(defaults)) {
      if (record[column] == null) record[column] = fallback;
    }
    for (const [column, places] of Object.entries(rounding)) {
      const value = record[column];
      if (typeof value === 'number') record[column] = roundTo(value, places);
    }
    if (hooks.cleanRecord) {
      const result = hooks.cleanRecord(record);
      if (!result) continue;
      record = result;
    }
    if (keyOf(record, table.primaryKey) === null) continue;
    for (const column of Object.keys(record)) {
      if (!columns.includes(column)) columns.push(column);
    }
    cleaned.push(record);
  }

  let records = cleaned;
  if (binding.duplicatePolicy === 'keep-last') {
    const byKey = new Map<string, FrameRecord>();
    for (const record of cleaned) {
      const key = keyOf(record, table.primaryKey) ?? '';
      byKey.delete(key);
      byKey.set(key, record);
    }
    records = [...byKey.values()];
  }

  return { columns, types: { ...frame.types }, records };
}

async function insertFrame(
  binding: ParserBinding,
  frame: Frame,
  session: ImportSession,
  options: InsertOptions
): Promise<InsertionOutcome> {
  const { table } = binding;
  const known = new Set(table.columns.map((column) => column.name));
  const columns = frame.columns.filter((column) => known.has(column));
  const ignored = frame.columns.filter((column) => !known.has(column));
  if (ignored.length) {
    options.logger?.('warn', `${options.filename}: ignoring columns not in ${table.name}: ${ignored.join(', ')}`);
  }

  let inserted = 0;
  let updated = 0;
  for (const [index, record] of frame.records.entries()) {
    const values: FrameRecord = {};
    for (const column of columns) {
      values[column] = record[column] ?? null;
    }
    try {
      const result = await session.upsert(table, values);
      if (result === 'inserted') inserted += 1;
      else updated += 1;
    } catch (error) {
      throw storageError(
        `row ${index + 1} (${describeKey(record, table.primaryKey)}): ${errorMessage(error)}`,
        error
      );
    }
  }

  return successOutcome({
    table_name: table.name,
    filename: options.filename,
    total_rows: frame.records.length,
    inserted_count: inserted,
    updated_count: updated,
  });
}

export function defineTableParser(binding: ParserBinding, hooks: ParserHooks = {}): TableParser {
  return {
    binding,
    validate: (frame) => validateFrame(binding, hooks, frame),
    clean: (frame) => cleanFrame(binding, hooks, frame),
    insert: (frame, session, options) => insertFrame(binding, frame, session, options),
  };
}
