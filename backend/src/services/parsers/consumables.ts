import { defineTableParser } from '../table-parser.js';
import { flag, float, int, text, varchar } from './columns.js';

export const consumablesParser = defineTableParser(
  {
    table: {
      name: 'Consumables',
      columns: [
        int('ID'),
        flag('Release'),
        varchar('Name', 255),
        text('Description'),
        varchar('Unit_Type', 100),
        int('I_Value'),
        float('F_Value'),
        int('Price'),
        int('Unit_Price'),
        int('VAT'),
        varchar('TaxableType', 50),
        varchar('Covered_Type', 50),
      ],
      primaryKey: ['ID'],
    },
    pattern: 'consumables',
    layout: 'metadata',
    required: ['ID', 'Name', 'Release'],
    duplicatePolicy: 'reject',
  },
  {
    defaults: { Unit_Type: 'Unspecified' },
  }
);
