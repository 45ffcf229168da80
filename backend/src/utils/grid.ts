import * as XLSX from 'xlsx';
import { structuralError } from '../errors.js';
import type { CellValue, Grid } from '../types/import.js';
import { isBlank } from './coerce.js';

function toCell(value: unknown): CellValue {
  if (value == null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (value instanceof Date) return value.toISOString().split('T')[0];
  return String(value);
}

export function isEmptyRow(row: readonly (CellValue | undefined)[]): boolean {
  return row.every((cell) => isBlank(cell));
}

/**
 * Decodes the first sheet of a workbook into a headerless grid. Rows are
 * padded to the widest row; fully empty rows are dropped.
 */
export function readGrid(bytes: Uint8Array): Grid {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(Buffer.from(bytes), { type: 'buffer' });
  } catch (error) {
    throw structuralError('file could not be read as a spreadsheet', error);
  }

  const [sheetName] = workbook.SheetNames;
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw structuralError('workbook has no sheets');
  }

  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });

  const rows = raw.map((row) => row.map(toCell));
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  return rows
    .filter((row) => !isEmptyRow(row))
    .map((row) => (row.length < width ? [...row, ...Array<CellValue>(width - row.length).fill(null)] : row));
}
