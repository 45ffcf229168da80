import type { CellValue } from '../types/import.js';

export function isBlank(value: CellValue | undefined): boolean {
  if (value == null) return true;
  return typeof value === 'string' && value.trim().length === 0;
}

export function parseNumber(value: CellValue | undefined): number | null {
  if (value == null) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  const str = value.trim();
  if (!str.length) return null;
  const parsed = Number(str);
  return Number.isFinite(parsed) ? parsed : null;
}

export function isNumeric(value: CellValue | undefined): boolean {
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value === 'string') return parseNumber(value) !== null;
  return false;
}

export function toInteger(value: CellValue | undefined): number | null {
  const parsed = parseNumber(value);
  return parsed === null ? null : Math.trunc(parsed);
}

/** Half-up rounding, for integer columns fed from currency cells. */
export function toRoundedInteger(value: CellValue | undefined): number | null {
  const parsed = parseNumber(value);
  return parsed === null ? null : Math.round(parsed);
}

export function toFloat(value: CellValue | undefined): number | null {
  return parseNumber(value);
}

export function toFlag(value: CellValue | undefined): 0 | 1 | null {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true') return 1;
    if (lowered === 'false') return 0;
  }
  const parsed = parseNumber(value);
  if (parsed === 0) return 0;
  if (parsed === 1) return 1;
  return null;
}

export function isFlag(value: CellValue | undefined): boolean {
  return toFlag(value) !== null;
}

export function toText(value: CellValue | undefined): string | null {
  if (value == null) return null;
  const str = String(value);
  return str === 'nan' ? null : str;
}

export function roundTo(value: number | null, places: number): number | null {
  if (value === null) return null;
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
