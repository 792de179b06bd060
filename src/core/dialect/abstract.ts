import type { ParsedQuery, TableParts } from '../ast/query.js';
import type { IdentifierNode } from '../ast/types.js';
import { SqlRenderError } from '../errors.js';
import { RESERVED_WORDS } from './reserved-words.js';

/**
 * How a dialect spells identifiers, strings and comments.
 * The identifier scanner reads table names from the source text with these rules.
 */
export interface LexicalRules {
  /** Accepted [open, close] identifier quote pairs */
  identifierQuotes: ReadonlyArray<readonly [string, string]>;
  stringQuotes: readonly string[];
  /** Backslash escapes the next character inside string literals */
  backslashEscapes: boolean;
  /** `#` starts a line comment */
  hashComments: boolean;
  /** Single-character class for the first character of a bare identifier */
  identifierStart: RegExp;
  /** Single-character class for the remaining characters */
  identifierPart: RegExp;
}

/** Bare identifiers: a letter or underscore, then letters, digits, underscores or dollars */
export const DEFAULT_IDENTIFIER_START = /[\p{L}_]/u;
export const DEFAULT_IDENTIFIER_PART = /[\p{L}\p{N}_$]/u;

/**
 * ANSI-flavoured rules; dialects spread and override them
 */
export const STANDARD_LEXICAL_RULES: LexicalRules = {
  identifierQuotes: [['"', '"']],
  stringQuotes: ["'"],
  backslashEscapes: false,
  hashComments: false,
  identifierStart: DEFAULT_IDENTIFIER_START,
  identifierPart: DEFAULT_IDENTIFIER_PART
};

const ASCII_UPPER = /[A-Z]/;

/**
 * Abstract base class for SQL dialect implementations.
 * A dialect names the grammar the statement is parsed with and owns the
 * rules table names are read and written with.
 */
export abstract class Dialect {
  /** Dialect identifier, also reported in rewrite log entries */
  abstract readonly name: string;

  /** `database` option of node-sql-parser for this dialect */
  abstract readonly parserDatabase: string;

  abstract readonly lexicalRules: LexicalRules;

  /** Opening and closing quote used when writing quoted identifiers */
  protected abstract readonly identifierQuote: readonly [string, string];

  /** Unquoted identifiers are folded to lower case by the database */
  protected readonly foldsUnquotedToLowerCase: boolean = false;

  private readonly reservedWords: ReadonlySet<string>;

  protected constructor(reservedWords: readonly string[] = []) {
    this.reservedWords = new Set([...RESERVED_WORDS.common, ...reservedWords]);
  }

  /**
   * Writes the query back out: the source text with every changed table name replaced.
   * Everything outside the table names, comments and hints included, is copied as written.
   */
  renderQuery(query: ParsedQuery): string {
    let sql = '';
    let cursor = 0;
    for (const { table } of query.tables) {
      sql += query.sql.slice(cursor, table.span.start);
      sql += isUnchanged(table)
        ? query.sql.slice(table.span.start, table.span.end)
        : this.formatTableName(table);
      cursor = table.span.end;
    }
    return sql + query.sql.slice(cursor);
  }

  /**
   * Renders catalog.schema.name; a catalog without a schema has no valid spelling
   */
  formatTableName(table: TableParts): string {
    if (table.catalog && !table.schema) {
      throw new SqlRenderError(`Table "${table.name.name}" has a catalog but no database qualifier`);
    }
    const parts = [table.catalog, table.schema, table.name].filter(
      (part): part is IdentifierNode => part !== undefined
    );
    return this.formatQualifiedName(parts);
  }

  /**
   * Quotes an SQL identifier, doubling any closing quote inside it
   * @param id - Unescaped identifier value
   */
  quoteIdentifier(id: string): string {
    const [open, close] = this.identifierQuote;
    return `${open}${id.split(close).join(close + close)}${close}`;
  }

  /**
   * Renders an identifier node, quoted exactly when its flag says so
   */
  formatIdentifier(node: IdentifierNode): string {
    return node.quoted ? this.quoteIdentifier(node.name) : node.name;
  }

  formatQualifiedName(parts: IdentifierNode[]): string {
    return parts.map(part => this.formatIdentifier(part)).join('.');
  }

  isReservedWord(word: string): boolean {
    return this.reservedWords.has(word.toUpperCase());
  }

  /**
   * Whether a value only names the intended object when quoted:
   * it breaks the bare identifier pattern, is a reserved word,
   * or would be case-folded by the database.
   */
  needsQuoting(value: string): boolean {
    const chars = Array.from(value);
    if (chars.length === 0) return true;
    const { identifierStart, identifierPart } = this.lexicalRules;
    if (!identifierStart.test(chars[0])) return true;
    if (chars.slice(1).some(ch => !identifierPart.test(ch))) return true;
    if (this.foldsUnquotedToLowerCase && ASCII_UPPER.test(value)) return true;
    return this.isReservedWord(value);
  }
}

const isUnchanged = (table: TableParts & { original: Readonly<TableParts> }): boolean =>
  table.catalog === table.original.catalog &&
  table.schema === table.original.schema &&
  table.name === table.original.name;
