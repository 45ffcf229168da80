import type { TableParser } from '../table-parser.js';
import { consumablesParser } from './consumables.js';
import { enumParser } from './enum.js';
import { globalConfigParser } from './global-config.js';
import { infoEventParser, infoMembershipParser, infoStandardParser } from './info.js';
import { membershipParser } from './membership.js';
import { procedureElementParser } from './procedure-element.js';
import {
  procedureBundleParser,
  procedureClassParser,
  procedureCustomParser,
  procedureSequenceParser,
} from './procedure-groups.js';
import { productEventParser, productStandardParser } from './products.js';

export const tableParsers: readonly TableParser[] = [
  enumParser,
  globalConfigParser,
  consumablesParser,
  procedureClassParser,
  procedureElementParser,
  procedureBundleParser,
  procedureCustomParser,
  procedureSequenceParser,
  infoStandardParser,
  infoEventParser,
  infoMembershipParser,
  productStandardParser,
  productEventParser,
  membershipParser,
];
