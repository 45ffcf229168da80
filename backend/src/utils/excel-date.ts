import type { CellValue } from '../types/import.js';

const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);
const DAY_MS = 24 * 60 * 60 * 1000;
// 9999-12-31, the last day a four-digit ISO year can hold
const MAX_SERIAL = 2958465;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

function formatDate(ms: number): string {
  return new Date(ms).toISOString().split('T')[0];
}

export function excelSerialToDate(serial: number): string | null {
  if (!Number.isFinite(serial) || serial < 0 || Math.floor(serial) > MAX_SERIAL) return null;
  return formatDate(EXCEL_EPOCH_MS + Math.floor(serial) * DAY_MS);
}

export function dateToExcelSerial(isoDate: string): number | null {
  const parsed = parseDateString(isoDate);
  if (!parsed) return null;
  return Math.round((Date.parse(`${parsed}T00:00:00Z`) - EXCEL_EPOCH_MS) / DAY_MS);
}

function parseDateString(value: string): string | null {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) return null;
  const [, year, month, day] = match;
  const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
  const formatted = formatDate(ms);
  // rejects rollovers such as 2024-02-30
  return formatted === `${year}-${month}-${day}` ? formatted : null;
}

/**
 * Accepts an Excel serial (number or numeric string) or a `YYYY-MM-DD[ HH:MM[:SS]]`
 * string and returns the calendar date as `YYYY-MM-DD`. Anything else is null.
 */
export function toIsoDate(value: CellValue | undefined): string | null {
  if (typeof value === 'number') return excelSerialToDate(value);
  if (typeof value !== 'string') return null;
  const str = value.trim();
  if (!str.length) return null;
  if (/^\d+(\.\d+)?$/.test(str)) return excelSerialToDate(Number(str));
  return parseDateString(str);
}
