import type { CellValue, DeclaredType, Frame, FrameRecord } from '../types/import.js';
import { toFloat, toInteger } from './coerce.js';

const NULL_TOKENS = new Set(['nan', 'none', 'null', 'na', 'n/a', 'nat']);

/**
 * True for every spelling of "no value" a spreadsheet export can leave behind:
 * the numeric sentinel -1, blank strings, and nan/none/null/na/n/a/nat in any
 * case, bare or wrapped in angle brackets.
 */
export function isSentinel(value: CellValue | undefined): boolean {
  if (value == null) return true;
  if (typeof value === 'number') return value === -1 || Number.isNaN(value);
  if (typeof value === 'boolean') return false;
  const token = value.trim().toLowerCase();
  if (token === '' || token === '-1') return true;
  const bare = token.startsWith('<') && token.endsWith('>') ? token.slice(1, -1) : token;
  return NULL_TOKENS.has(bare);
}

export function normalizeCell(value: CellValue, type: DeclaredType = 'unknown'): CellValue {
  if (isSentinel(value)) return null;
  let result: CellValue = typeof value === 'string' ? value.trim() : value;
  if (type === 'int') {
    result = toInteger(result);
  } else if (type === 'float') {
    result = toFloat(result);
  }
  return result === -1 ? null : result;
}

export function normalizeFrame(frame: Frame): Frame {
  const records = frame.records.map((record) => {
    const normalized: FrameRecord = {};
    for (const column of frame.columns) {
      normalized[column] = normalizeCell(record[column] ?? null, frame.types[column]);
    }
    return normalized;
  });
  return { columns: [...frame.columns], types: { ...frame.types }, records };
}
