import type { IdentifierNode } from '../ast/types.js';
import type { ParsedQuery } from '../ast/query.js';
import type { Dialect } from '../dialect/abstract.js';
import { SqlParseError } from '../errors.js';
import { IdentifierScanner } from './identifier-scanner.js';
import { SelectParser } from './select-parser.js';

export { IdentifierScanner } from './identifier-scanner.js';
export type { ScannedName } from './identifier-scanner.js';
export { SelectParser } from './select-parser.js';

/**
 * Dotted name such as `cat.db.table` or `db.*`
 */
export interface QualifiedName {
  parts: IdentifierNode[];
  /** Whether the name ended in `.*` */
  wildcard: boolean;
}

/**
 * Parses one SELECT statement and locates its table references
 * @param sql - Statement text; a trailing semicolon is allowed
 * @param dialect - Dialect whose grammar and quoting rules apply
 * @throws SqlParseError when the text is not a single valid SELECT
 */
export const parseSelect = (sql: string, dialect: Dialect): ParsedQuery =>
  new SelectParser(sql, dialect).parseStatement();

/**
 * Parses a dotted identifier with the dialect's quoting rules, e.g. "`my-db`.orders"
 * @param options.allowWildcard - Accept a trailing `.*`
 */
export const parseQualifiedName = (
  text: string,
  dialect: Dialect,
  options: { allowWildcard?: boolean } = {}
): QualifiedName => {
  const scanner = new IdentifierScanner(text, dialect.lexicalRules);
  const start = scanner.skipTrivia(0);
  const name = scanner.readQualifiedName(start, options.allowWildcard ?? false);
  if (!name) {
    const message = start < text.length ? `Unexpected "${text[start]}"` : 'Expected an identifier';
    throw new SqlParseError(message, scanner.positionAt(start));
  }
  const end = scanner.skipTrivia(name.end);
  if (end < text.length) {
    throw new SqlParseError(`Unexpected "${text[end]}"`, scanner.positionAt(end));
  }
  return { parts: name.parts, wildcard: name.wildcard };
};
