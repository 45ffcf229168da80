import { structuralError } from '../errors.js';
import type { Frame, FrameRecord, Grid } from '../types/import.js';
import { isSentinel } from '../utils/sentinels.js';

const ID_STEP = 10;

export const PIVOT_COLUMNS = ['enum_type', 'id', 'name'] as const;

function participates(header: string): boolean {
  return header.length > 0 && !header.startsWith('ID');
}

/**
 * Reads a column-per-category sheet: row 1 names each category, the cells
 * below it are its labels. Missing-value cells are skipped, and every
 * remaining label gets an id of 10, 20, 30... within its category, in row order.
 */
export function pivotFrame(grid: Grid): Frame {
  if (grid.length < 2) {
    throw structuralError('expected a category header row and at least one value row');
  }

  const [header, ...body] = grid;
  const records: FrameRecord[] = [];
  let categories = 0;

  header.forEach((cell, index) => {
    const category = cell == null ? '' : String(cell).trim();
    if (!participates(category)) return;
    categories += 1;

    let position = 0;
    for (const row of body) {
      const value = row[index];
      if (isSentinel(value)) continue;
      position += 1;
      records.push({ enum_type: category, id: position * ID_STEP, name: String(value).trim() });
    }
  });

  if (!categories) {
    throw structuralError('no category columns found in the header row');
  }
  if (!records.length) {
    throw structuralError('category columns contain no values');
  }

  return {
    columns: [...PIVOT_COLUMNS],
    types: { enum_type: 'string', id: 'int', name: 'string' },
    records,
  };
}
