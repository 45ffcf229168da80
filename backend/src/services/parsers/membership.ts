import { defineTableParser } from '../table-parser.js';
import { date, flag, float, int, varchar } from './columns.js';

export const membershipParser = defineTableParser(
  {
    table: {
      name: 'Membership',
      columns: [
        int('ID'),
        flag('Release'),
        int('Membership_Info_ID'),
        int('Payment_Amount'),
        int('Bonus_Point'),
        int('Credit'),
        float('Discount_Rate'),
        varchar('Package_Type', 50),
        int('Element_ID'),
        int('Bundle_ID'),
        int('Custom_ID'),
        int('Sequence_ID'),
        int('Validity_Period'),
        date('Release_Start_Date'),
        date('Release_End_Date'),
      ],
      primaryKey: ['ID'],
    },
    pattern: 'membership',
    layout: 'metadata',
    required: ['ID', 'Release', 'Membership_Info_ID', 'Payment_Amount'],
    duplicatePolicy: 'reject',
  },
  {
    rounding: { Discount_Rate: 4 },
  }
);
