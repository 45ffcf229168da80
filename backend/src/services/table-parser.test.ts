import { describe, it, expect, vi } from 'vitest';
import { MemoryDatabase } from '../testing/memory-database.js';
import type { Frame } from '../types/import.js';
import { consumablesParser } from './parsers/consumables.js';
import { procedureBundleParser, procedureClassParser } from './parsers/procedure-groups.js';

function frameOf(columns: string[], records: Frame['records']): Frame {
  return { columns, types: {}, records };
}

describe('validate', () => {
  it('reports every problem in one pass', () => {
    const frame = frameOf(
      ['ID', 'Name', 'Release'],
      [
        { ID: null, Name: 'Gauze', Release: 1 },
        { ID: 'abc', Name: 'Tape', Release: 1 },
        { ID: 3, Name: 'x'.repeat(256), Release: 1 },
      ]
    );

    const outcome = consumablesParser.validate(frame);
    expect(outcome.valid).toBe(false);
    expect(outcome.errors).toEqual([
      'row 1: primary key ID is empty',
      'row 2: column ID expects a number, got "abc"',
      'row 3: column Name exceeds 255 characters',
    ]);
    expect(outcome.issues.map((issue) => issue.kind)).toEqual(['null_primary_key', 'type_coercion', 'invalid_value']);
  });

  it('reports missing required columns', () => {
    const frame = frameOf(['GroupID', 'ID', 'Name'], [{ GroupID: 1, ID: 1, Name: 'Glow' }]);
    expect(procedureBundleParser.validate(frame).errors).toEqual(['missing required column Element_ID']);
  });

  it('rejects duplicate composite keys when the table forbids them', () => {
    const frame = frameOf(
      ['GroupID', 'ID', 'Name', 'Element_ID'],
      [
        { GroupID: 1, ID: 1, Name: 'A', Element_ID: 10 },
        { GroupID: 1, ID: 1, Name: 'B', Element_ID: 11 },
      ]
    );

    const outcome = procedureBundleParser.validate(frame);
    expect(outcome.valid).toBe(false);
    expect(outcome.errors).toEqual(['row 2: duplicate primary key (GroupID=1, ID=1) first seen in row 1']);
  });

  it('accepts duplicate keys on a keep-last table', () => {
    const frame = frameOf(
      ['GroupID', 'ID'],
      [
        { GroupID: 1, ID: 1 },
        { GroupID: 1, ID: 1 },
      ]
    );
    expect(procedureClassParser.validate(frame).valid).toBe(true);
  });

  it('does not modify the frame', () => {
    const frame = frameOf(['ID', 'Name', 'Release'], [{ ID: '4', Name: 'Gauze', Release: 1 }]);
    consumablesParser.validate(frame);
    expect(frame).toEqual(frameOf(['ID', 'Name', 'Release'], [{ ID: '4', Name: 'Gauze', Release: 1 }]));
  });
});

describe('clean', () => {
  it('keeps the last occurrence of a duplicated key', () => {
    const frame = frameOf(
      ['GroupID', 'ID', 'Release', 'Class_Major'],
      [
        { GroupID: 1, ID: 1, Release: 1, Class_Major: 'Laser' },
        { GroupID: 1, ID: 2, Release: 1, Class_Major: 'Ultrasound' },
        { GroupID: 1, ID: 1, Release: 0, Class_Major: 'Laser v2' },
      ]
    );

    expect(procedureClassParser.clean(frame).records).toEqual([
      { GroupID: 1, ID: 2, Release: 1, Class_Major: 'Ultrasound' },
      { GroupID: 1, ID: 1, Release: 0, Class_Major: 'Laser v2' },
    ]);
  });

  it('fills defaults and coerces by column kind', () => {
    const cleaned = consumablesParser.clean(frameOf(['ID', 'Name', 'Release'], [{ ID: '4', Name: 'Gauze', Release: true }]));
    expect(cleaned.columns).toEqual(['ID', 'Name', 'Release', 'Unit_Type']);
    expect(cleaned.records).toEqual([{ ID: 4, Name: 'Gauze', Release: 1, Unit_Type: 'Unspecified' }]);
  });

  it('drops rows whose key is null after coercion', () => {
    const cleaned = procedureClassParser.clean(
      frameOf(
        ['GroupID', 'ID'],
        [
          { GroupID: 1, ID: 'n/a' },
          { GroupID: 1, ID: 3 },
        ]
      )
    );
    expect(cleaned.records).toEqual([{ GroupID: 1, ID: 3 }]);
  });

  it('rounds ratios to four places', () => {
    const cleaned = procedureBundleParser.clean(
      frameOf(['GroupID', 'ID', 'Price_Ratio'], [{ GroupID: 1, ID: 1, Price_Ratio: 0.123456 }])
    );
    expect(cleaned.records[0].Price_Ratio).toBe(0.1235);
  });
});

describe('insert', () => {
  const frame = frameOf(
    ['GroupID', 'ID', 'Class_Major', 'Notes'],
    [
      { GroupID: 1, ID: 1, Class_Major: 'Laser', Notes: 'internal' },
      { GroupID: 1, ID: 2, Class_Major: 'Ultrasound', Notes: null },
    ]
  );

  it('upserts known columns and counts inserts and updates', async () => {
    const database = new MemoryDatabase();
    const logger = vi.fn();

    const first = await database.transaction((session) =>
      procedureClassParser.insert(frame, session, { filename: 'classes.xlsx', logger })
    );
    const second = await database.transaction((session) =>
      procedureClassParser.insert(frame, session, { filename: 'classes.xlsx', logger })
    );

    expect(first.inserted_count).toBe(2);
    expect(first.updated_count).toBe(0);
    expect(second.inserted_count).toBe(0);
    expect(second.updated_count).toBe(2);
    expect(database.rows('Procedure_Class')).toEqual([
      { GroupID: 1, ID: 1, Class_Major: 'Laser' },
      { GroupID: 1, ID: 2, Class_Major: 'Ultrasound' },
    ]);
    expect(logger).toHaveBeenCalledWith('warn', 'classes.xlsx: ignoring columns not in Procedure_Class: Notes');
  });

  it('names the failing row', async () => {
    const database = new MemoryDatabase();
    database.rejectRow = (_table, values) => (values.ID === 2 ? 'value too long' : null);

    await expect(
      database.transaction((session) => procedureClassParser.insert(frame, session, { filename: 'classes.xlsx' }))
    ).rejects.toThrow('row 2 (GroupID=1, ID=2): value too long');
    expect(database.rows('Procedure_Class')).toEqual([]);
  });
});
