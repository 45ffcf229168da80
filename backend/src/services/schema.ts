import type { ColumnDefinition, TableDefinition } from '../types/import.js';

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function columnType(column: ColumnDefinition): string {
  switch (column.kind) {
    case 'int':
      return 'integer';
    case 'float':
      return 'double precision';
    case 'flag':
      return 'smallint';
    case 'varchar':
      return column.length === undefined ? 'varchar' : `varchar(${column.length})`;
    case 'date':
      return 'date';
    default:
      return 'text';
  }
}

export function createTableSql(table: TableDefinition): string {
  const columns = table.columns.map((column) => {
    const notNull = table.primaryKey.includes(column.name) ? ' not null' : '';
    return `  ${quoteIdent(column.name)} ${columnType(column)}${notNull}`;
  });
  columns.push(`  primary key (${table.primaryKey.map(quoteIdent).join(', ')})`);
  return `create table if not exists ${quoteIdent(table.name)} (\n${columns.join(',\n')}\n)`;
}
