import type { TableDefinition } from '../../types/import.js';
import { defineTableParser } from '../table-parser.js';
import { date, flag, float, int, varchar } from './columns.js';

const RATES = { Discount_Rate: 4, Margin_Rate: 4 };

function productTable(name: string, infoColumn: string, windowPrefix: string): TableDefinition {
  return {
    name,
    columns: [
      int('ID'),
      flag('Release'),
      varchar('Package_Type', 50),
      int('Element_ID'),
      int('Bundle_ID'),
      int('Custom_ID'),
      int('Sequence_ID'),
      int(infoColumn),
      int('Procedure_Cost'),
      int('Sell_Price'),
      float('Discount_Rate'),
      int('Original_Price'),
      int('Margin'),
      float('Margin_Rate'),
      date(`${windowPrefix}_Start_Date`),
      date(`${windowPrefix}_End_Date`),
      int('Validity_Period'),
    ],
    primaryKey: ['ID'],
  };
}

export const productStandardParser = defineTableParser(
  {
    table: productTable('Product_Standard', 'Standard_Info_ID', 'Standard'),
    pattern: 'product_standard',
    layout: 'metadata',
    required: ['ID'],
    duplicatePolicy: 'reject',
  },
  { rounding: RATES }
);

export const productEventParser = defineTableParser(
  {
    table: productTable('Product_Event', 'Event_Info_ID', 'Event'),
    pattern: 'product_event',
    layout: 'metadata',
    required: ['ID'],
    duplicatePolicy: 'reject',
  },
  { rounding: RATES }
);
