import { structuralError } from '../errors.js';
import type { CellValue, DeclaredType, Frame, FrameRecord, Grid } from '../types/import.js';
import { toFlag, toFloat, toInteger, toRoundedInteger, toText } from '../utils/coerce.js';
import { isEmptyRow } from '../utils/grid.js';

const DESCRIPTOR_ROWS = 4;
const ENABLE_ROW = 1;
const TYPE_ROW = 2;
const NAME_ROW = 3;

const ROUNDED_COLUMNS = new Set(['VAT']);

export function parseTypeTag(tag: CellValue | undefined): DeclaredType {
  const upper = tag == null ? '' : String(tag).toUpperCase();
  if (upper.includes('INT')) return 'int';
  if (upper.includes('FLOAT') || upper.includes('DECIMAL')) return 'float';
  if (upper.includes('BOOL')) return 'bool';
  if (upper.includes('VARCHAR') || upper.includes('TEXT') || upper.includes('STRING')) return 'string';
  return 'unknown';
}

function isEnabled(flag: CellValue | undefined): boolean {
  if (flag === 1) return true;
  return typeof flag === 'string' && flag.trim() === '1';
}

function coerce(column: string, type: DeclaredType, value: CellValue): CellValue {
  switch (type) {
    case 'int':
      return ROUNDED_COLUMNS.has(column) ? toRoundedInteger(value) : toInteger(value);
    case 'float':
      return toFloat(value);
    case 'bool':
      return toFlag(value);
    case 'string':
      return toText(value);
    default:
      return value;
  }
}

/**
 * Projects the enabled columns of a self-describing sheet. Rows 1-4 hold the
 * description, enable flag, type tag and column name; data starts at row 5.
 */
export function extractFrame(grid: Grid): Frame {
  const rows = grid.filter((row) => !isEmptyRow(row));
  if (rows.length <= DESCRIPTOR_ROWS) {
    throw structuralError(
      `expected ${DESCRIPTOR_ROWS} descriptor rows and at least one data row, found ${rows.length} rows`
    );
  }

  const enableRow = rows[ENABLE_ROW];
  const typeRow = rows[TYPE_ROW];
  const nameRow = rows[NAME_ROW];

  const selected: number[] = [];
  enableRow.forEach((flag, index) => {
    if (isEnabled(flag)) selected.push(index);
  });
  if (!selected.length) {
    throw structuralError('no columns are enabled in the descriptor');
  }

  const columns: string[] = [];
  const types: Record<string, DeclaredType> = {};
  for (const index of selected) {
    const rawName = nameRow[index];
    const name = rawName == null ? '' : String(rawName).trim();
    if (!name.length) {
      throw structuralError(`enabled column ${index + 1} has no name`);
    }
    if (columns.includes(name)) {
      throw structuralError(`column ${name} is declared more than once`);
    }
    columns.push(name);
    types[name] = parseTypeTag(typeRow[index]);
  }

  let records: FrameRecord[] = rows
    .slice(DESCRIPTOR_ROWS)
    .map((row) => selected.map((index) => row[index] ?? null))
    .filter((values) => !isEmptyRow(values))
    .map((values) => {
      const record: FrameRecord = {};
      columns.forEach((column, position) => {
        record[column] = coerce(column, types[column], values[position]);
      });
      return record;
    });

  if (columns.includes('Release')) {
    records = records.filter((record) => record.Release === 0 || record.Release === 1);
  }

  return { columns, types, records };
}
