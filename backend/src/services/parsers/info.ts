import type { TableDefinition } from '../../types/import.js';
import { defineTableParser } from '../table-parser.js';
import { flag, int, text, varchar } from './columns.js';

function infoTable(name: string, prefix: string, idColumn: string): TableDefinition {
  return {
    name,
    columns: [
      int('ID'),
      flag('Release'),
      int(idColumn),
      varchar(`${prefix}_Name`, 255),
      text(`${prefix}_Description`),
      text('Precautions'),
    ],
    primaryKey: ['ID'],
  };
}

export const infoStandardParser = defineTableParser({
  table: infoTable('Info_Standard', 'Product_Standard', 'Product_Standard_ID'),
  pattern: 'info_standard',
  layout: 'metadata',
  required: ['ID'],
  duplicatePolicy: 'reject',
});

export const infoEventParser = defineTableParser({
  table: infoTable('Info_Event', 'Event', 'Event_ID'),
  pattern: 'info_event',
  layout: 'metadata',
  required: ['ID', 'Release', 'Event_ID', 'Event_Name'],
  duplicatePolicy: 'reject',
});

export const infoMembershipParser = defineTableParser({
  table: infoTable('Info_Membership', 'Membership', 'Membership_ID'),
  pattern: 'info_membership',
  layout: 'metadata',
  required: ['ID', 'Release', 'Membership_ID', 'Membership_Name'],
  duplicatePolicy: 'reject',
});
