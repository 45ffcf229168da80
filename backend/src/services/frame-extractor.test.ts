import { describe, it, expect } from 'vitest';
import { ImportError } from '../errors.js';
import type { Grid } from '../types/import.js';
import { extractFrame, parseTypeTag } from './frame-extractor.js';

describe('parseTypeTag', () => {
  it('matches tags by substring, case-insensitively', () => {
    expect(parseTypeTag('INT(11)')).toBe('int');
    expect(parseTypeTag('bigint')).toBe('int');
    expect(parseTypeTag('DECIMAL(5,2)')).toBe('float');
    expect(parseTypeTag('float')).toBe('float');
    expect(parseTypeTag('BOOLEAN')).toBe('bool');
    expect(parseTypeTag('VARCHAR(50)')).toBe('string');
    expect(parseTypeTag('Text')).toBe('string');
    expect(parseTypeTag('JSON')).toBe('unknown');
    expect(parseTypeTag(null)).toBe('unknown');
  });
});

describe('extractFrame', () => {
  it('projects only enabled columns, in sheet order', () => {
    const grid: Grid = [
      ['first', 'second', 'third', 'fourth'],
      [1, 0, '1', 0],
      ['INT', 'VARCHAR', 'FLOAT', 'INT'],
      ['A', 'B', 'C', 'D'],
      [1, 'x', '2.5', 9],
      [2, 'y', 'bad', 8],
    ];

    const frame = extractFrame(grid);
    expect(frame.columns).toEqual(['A', 'C']);
    expect(frame.types).toEqual({ A: 'int', C: 'float' });
    expect(frame.records).toEqual([
      { A: 1, C: 2.5 },
      { A: 2, C: null },
    ]);
  });

  it('coerces each column by its type tag', () => {
    const grid: Grid = [
      ['id', 'vat', 'rate', 'active', 'name', 'note', 'extra'],
      [1, 1, 1, 1, 1, 1, 1],
      ['INT', 'INT', 'DECIMAL(5,3)', 'BOOL', 'VARCHAR(50)', 'TEXT', 'JSON'],
      ['ID', 'VAT', 'Rate', 'Active', 'Name', 'Note', 'Extra'],
      ['7', 10.5, '0.125', true, 'nan', 42, 'raw'],
      [7.9, 10.4, 1, 'false', 'Gauze', null, 3],
      [8, null, null, 2, null, 'x', null],
    ];

    expect(extractFrame(grid).records).toEqual([
      { ID: 7, VAT: 11, Rate: 0.125, Active: 1, Name: null, Note: '42', Extra: 'raw' },
      { ID: 7, VAT: 10, Rate: 1, Active: 0, Name: 'Gauze', Note: null, Extra: 3 },
      { ID: 8, VAT: null, Rate: null, Active: null, Name: null, Note: 'x', Extra: null },
    ]);
  });

  it('keeps only rows released as 0 or 1', () => {
    const grid: Grid = [
      ['id', 'release'],
      [1, 1],
      ['INT', 'INT'],
      ['ID', 'Release'],
      [1, 1],
      [2, 0],
      [3, 2],
      [4, null],
      [5, '1'],
    ];

    expect(extractFrame(grid).records.map((record) => record.ID)).toEqual([1, 2, 5]);
  });

  it('drops rows that are empty once projected', () => {
    const grid: Grid = [
      ['id', 'comment'],
      [1, 0],
      ['INT', 'VARCHAR'],
      ['ID', 'Comment'],
      [null, 'only a comment'],
      [3, null],
    ];

    expect(extractFrame(grid).records).toEqual([{ ID: 3 }]);
  });

  it('rejects a sheet without data rows', () => {
    const grid: Grid = [['d'], [1], ['INT'], ['ID']];
    expect(() => extractFrame(grid)).toThrow(ImportError);
    expect(() => extractFrame(grid)).toThrow('expected 4 descriptor rows and at least one data row, found 4 rows');
  });

  it('rejects a descriptor with nothing enabled', () => {
    const grid: Grid = [['d'], [0], ['INT'], ['ID'], [1]];
    expect(() => extractFrame(grid)).toThrow('no columns are enabled in the descriptor');
  });

  it('rejects duplicate and unnamed enabled columns', () => {
    expect(() => extractFrame([['d', 'd'], [1, 1], ['INT', 'INT'], ['ID', 'ID'], [1, 2]])).toThrow(
      'column ID is declared more than once'
    );
    expect(() => extractFrame([['d', 'd'], [1, 1], ['INT', 'INT'], ['ID', ' '], [1, 2]])).toThrow(
      'enabled column 2 has no name'
    );
  });
});
