import { describe, it, expect } from 'vitest';
import type { Grid } from '../types/import.js';
import { pivotFrame } from './pivot-transform.js';

describe('pivotFrame', () => {
  const grid: Grid = [
    ['ID', 'TaxType', '', 'UnitType', 'Empty'],
    [1, 'A', 'x', 'ml', null],
    [2, 'B', null, 'cc', null],
    [3, 'C', null, null, null],
    [4, 'D', null, 'g', null],
    [5, 'E', null, null, null],
  ];

  it('emits one record per non-empty cell', () => {
    expect(pivotFrame(grid).records).toHaveLength(8);
  });

  it('numbers labels 10, 20, 30... within each category', () => {
    const frame = pivotFrame(grid);
    expect(frame.columns).toEqual(['enum_type', 'id', 'name']);
    expect(frame.records.filter((record) => record.enum_type === 'TaxType').map((record) => record.id)).toEqual([
      10, 20, 30, 40, 50,
    ]);
    expect(frame.records.filter((record) => record.enum_type === 'UnitType')).toEqual([
      { enum_type: 'UnitType', id: 10, name: 'ml' },
      { enum_type: 'UnitType', id: 20, name: 'cc' },
      { enum_type: 'UnitType', id: 30, name: 'g' },
    ]);
  });

  it('skips ID-prefixed headers and stringifies labels', () => {
    const frame = pivotFrame([
      ['IDX', ' Level '],
      ['skip', 3],
      [null, ' hard '],
    ]);
    expect(frame.records).toEqual([
      { enum_type: 'Level', id: 10, name: '3' },
      { enum_type: 'Level', id: 20, name: 'hard' },
    ]);
  });

  it('skips missing-value labels without spending an id on them', () => {
    const frame = pivotFrame([
      ['TaxType'],
      ['VAT'],
      ['NA'],
      [' <None> '],
      [-1],
      ['Exempt'],
    ]);
    expect(frame.records).toEqual([
      { enum_type: 'TaxType', id: 10, name: 'VAT' },
      { enum_type: 'TaxType', id: 20, name: 'Exempt' },
    ]);
  });

  it('fails without a usable category', () => {
    expect(() => pivotFrame([['TaxType']])).toThrow('expected a category header row and at least one value row');
    expect(() => pivotFrame([['ID', ''], [1, 'x']])).toThrow('no category columns found in the header row');
    expect(() => pivotFrame([['TaxType'], ['  ']])).toThrow('category columns contain no values');
  });
});
