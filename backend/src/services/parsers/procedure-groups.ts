import { defineTableParser } from '../table-parser.js';
import { flag, float, int, text, varchar } from './columns.js';

const GROUP_KEY = ['GroupID', 'ID'];
const PRICE_RATIO = { Price_Ratio: 4 };

export const procedureClassParser = defineTableParser({
  table: {
    name: 'Procedure_Class',
    columns: [
      int('GroupID'),
      int('ID'),
      flag('Release'),
      varchar('Class_Major', 50),
      varchar('Class_Sub', 50),
      varchar('Class_Detail', 50),
      varchar('Class_Type', 50),
    ],
    primaryKey: GROUP_KEY,
  },
  pattern: 'procedure_class',
  layout: 'metadata',
  required: GROUP_KEY,
  duplicatePolicy: 'keep-last',
});

export const procedureBundleParser = defineTableParser(
  {
    table: {
      name: 'Procedure_Bundle',
      columns: [
        int('GroupID'),
        int('ID'),
        flag('Release'),
        varchar('Name', 255),
        text('Description'),
        int('Element_ID'),
        int('Element_Cost'),
        float('Price_Ratio'),
      ],
      primaryKey: GROUP_KEY,
    },
    pattern: 'procedure_bundle',
    layout: 'metadata',
    required: [...GROUP_KEY, 'Name', 'Element_ID'],
    duplicatePolicy: 'reject',
  },
  { rounding: PRICE_RATIO }
);

export const procedureCustomParser = defineTableParser(
  {
    table: {
      name: 'Procedure_Custom',
      columns: [
        int('GroupID'),
        int('ID'),
        flag('Release'),
        varchar('Name', 255),
        text('Description'),
        int('Element_ID'),
        int('Custom_Count'),
        int('Element_Limit'),
        int('Element_Cost'),
        float('Price_Ratio'),
      ],
      primaryKey: GROUP_KEY,
    },
    pattern: 'procedure_custom',
    layout: 'metadata',
    required: [...GROUP_KEY, 'Release', 'Name', 'Element_ID'],
    duplicatePolicy: 'reject',
  },
  { rounding: PRICE_RATIO }
);

export const procedureSequenceParser = defineTableParser(
  {
    table: {
      name: 'Procedure_Sequence',
      columns: [
        int('GroupID'),
        int('ID'),
        flag('Release'),
        int('Step_Num'),
        int('Element_ID'),
        int('Bundle_ID'),
        int('Custom_ID'),
        int('Sequence_Interval'),
        int('Procedure_Cost'),
        float('Price_Ratio'),
      ],
      primaryKey: GROUP_KEY,
    },
    pattern: 'procedure_sequence',
    layout: 'metadata',
    required: GROUP_KEY,
    duplicatePolicy: 'reject',
  },
  { rounding: PRICE_RATIO }
);
