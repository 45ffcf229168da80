import { describe, it, expect } from 'vitest';
import { buildUpsert } from './db.js';
import { procedureClassParser } from './services/parsers/procedure-groups.js';

const table = procedureClassParser.binding.table;

describe('buildUpsert', () => {
  it('updates every non-key column on conflict', () => {
    expect(buildUpsert(table, { GroupID: 1, ID: 2, Class_Major: 'Laser' })).toEqual({
      text:
        'insert into "Procedure_Class" ("GroupID", "ID", "Class_Major") values ($1, $2, $3) ' +
        'on conflict ("GroupID", "ID") do update set "Class_Major" = excluded."Class_Major" ' +
        'returning (xmax = 0) as inserted',
      params: [1, 2, 'Laser'],
    });
  });

  it('falls back to do nothing when only key columns are present', () => {
    expect(buildUpsert(table, { GroupID: 1, ID: 2 }).text).toBe(
      'insert into "Procedure_Class" ("GroupID", "ID") values ($1, $2) on conflict ("GroupID", "ID") do nothing returning true as inserted'
    );
  });
});
