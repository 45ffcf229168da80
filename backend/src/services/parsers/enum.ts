import { defineTableParser } from '../table-parser.js';
import { int, varchar } from './columns.js';

export const enumParser = defineTableParser(
  {
    table: {
      name: 'Enum',
      columns: [varchar('enum_type', 50), int('id'), varchar('name', 255)],
      primaryKey: ['enum_type', 'id'],
    },
    pattern: 'enum',
    layout: 'pivot',
    required: ['enum_type', 'id', 'name'],
    duplicatePolicy: 'reject',
  }
);
