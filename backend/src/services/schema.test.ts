import { describe, it, expect } from 'vitest';
import { procedureClassParser } from './parsers/procedure-groups.js';
import { globalConfigParser } from './parsers/global-config.js';
import { createTableSql, quoteIdent } from './schema.js';

describe('createTableSql', () => {
  it('quotes mixed-case identifiers', () => {
    expect(quoteIdent('Procedure_Class')).toBe('"Procedure_Class"');
    expect(quoteIdent('odd"name')).toBe('"odd""name"');
  });

  it('builds the table from its column kinds', () => {
    expect(createTableSql(globalConfigParser.binding.table)).toBe(
      [
        'create table if not exists "Global" (',
        '  "ID" integer not null,',
        '  "Doc_Price_Minute" integer,',
        '  "Aesthetician_Price_Minute" integer,',
        '  primary key ("ID")',
        ')',
      ].join('\n')
    );
  });

  it('declares composite keys', () => {
    const sql = createTableSql(procedureClassParser.binding.table);
    expect(sql).toContain('  "Release" smallint,');
    expect(sql).toContain('  "Class_Major" varchar(50),');
    expect(sql.endsWith('  primary key ("GroupID", "ID")\n)')).toBe(true);
  });
});
