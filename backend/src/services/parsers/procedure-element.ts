import { defineTableParser } from '../table-parser.js';
import { flag, float, int, text, varchar } from './columns.js';

export const procedureElementParser = defineTableParser(
  {
    table: {
      name: 'Procedure_Element',
      columns: [
        int('ID'),
        flag('Release'),
        varchar('Class_Major', 100),
        varchar('Class_Sub', 100),
        varchar('Class_Detail', 100),
        varchar('Class_Type', 100),
        varchar('Name', 255),
        text('Description'),
        varchar('Position_Type', 100),
        float('Cost_Time'),
        flag('Plan_State'),
        int('Plan_Count'),
        int('Consum_1_ID'),
        int('Consum_1_Count'),
        varchar('Procedure_Level', 50),
        int('Procedure_Cost'),
        int('Price'),
      ],
      primaryKey: ['ID'],
    },
    pattern: 'procedure_element',
    layout: 'metadata',
    required: ['ID', 'Name'],
    duplicatePolicy: 'reject',
  },
  {
    defaults: { Plan_State: 0 },
    cleanRecord: (record) => {
      if (record.Consum_1_ID != null && record.Consum_1_Count == null) {
        return { ...record, Consum_1_Count: 1 };
      }
      return record;
    },
  }
);
