import path from 'node:path';
import { unsupportedFilename } from '../errors.js';
import type { TableDefinition } from '../types/import.js';
import { tableParsers } from './parsers/index.js';
import { workbookName, type TableParser } from './table-parser.js';

export type ParserRegistry = {
  /** Rules in evaluation order. */
  readonly rules: readonly TableParser[];
  match(filename: string): TableParser | undefined;
  select(filename: string): TableParser;
  supportedFiles(): string[];
  tables(): TableDefinition[];
};

/**
 * Orders rules so that a pattern containing another pattern is always tried
 * first ("info_membership" before "membership").
 */
export function orderRules(parsers: readonly TableParser[]): TableParser[] {
  const ordered: TableParser[] = [];
  for (const parser of parsers) {
    const pattern = parser.binding.pattern;
    if (ordered.some((existing) => existing.binding.pattern === pattern)) {
      throw new Error(`duplicate dispatch pattern: ${pattern}`);
    }
    const shadowed = ordered.findIndex((existing) => pattern.includes(existing.binding.pattern));
    if (shadowed === -1) ordered.push(parser);
    else ordered.splice(shadowed, 0, parser);
  }

  ordered.forEach((later, index) => {
    const earlier = ordered.slice(0, index).find((rule) => later.binding.pattern.includes(rule.binding.pattern));
    if (earlier) {
      throw new Error(`pattern ${later.binding.pattern} is shadowed by ${earlier.binding.pattern}`);
    }
  });
  return ordered;
}

export function createParserRegistry(parsers: readonly TableParser[] = tableParsers): ParserRegistry {
  const rules = orderRules(parsers);

  const match = (filename: string): TableParser | undefined => {
    const key = path.basename(filename).toLowerCase();
    return rules.find((rule) => key.includes(rule.binding.pattern));
  };

  return {
    rules,
    match,
    select(filename) {
      const parser = match(filename);
      if (!parser) {
        throw unsupportedFilename(filename);
      }
      return parser;
    },
    supportedFiles() {
      return rules.map((rule) => workbookName(rule.binding));
    },
    tables() {
      return rules.map((rule) => rule.binding.table);
    },
  };
}
