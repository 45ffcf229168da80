import { defineTableParser } from '../table-parser.js';
import { int } from './columns.js';

const PRICE_COLUMNS = ['Doc_Price_Minute', 'Aesthetician_Price_Minute'];

export const globalConfigParser = defineTableParser(
  {
    table: {
      name: 'Global',
      columns: [int('ID'), int('Doc_Price_Minute'), int('Aesthetician_Price_Minute')],
      primaryKey: ['ID'],
    },
    pattern: 'global',
    layout: 'metadata',
    required: ['ID', 'Doc_Price_Minute'],
    duplicatePolicy: 'reject',
  },
  {
    validateRecord: (record, row, issues) => {
      for (const column of PRICE_COLUMNS) {
        const value = record[column];
        if (typeof value === 'number' && value < 0) {
          issues.add('invalid_value', `row ${row}: ${column} must not be negative`);
        }
      }
    },
  }
);
