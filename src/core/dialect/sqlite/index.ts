import { Dialect, STANDARD_LEXICAL_RULES, type LexicalRules } from '../abstract.js';
import { RESERVED_WORDS } from '../reserved-words.js';

/**
 * SQLite accepts MySQL backticks and SQL Server brackets besides double quotes
 */
const SQLITE_LEXICAL_RULES: LexicalRules = {
  ...STANDARD_LEXICAL_RULES,
  identifierQuotes: [['"', '"'], ['`', '`'], ['[', ']']]
};

/**
 * SQLite dialect implementation
 */
export class SqliteDialect extends Dialect {
  readonly name = 'sqlite';
  readonly parserDatabase = 'Sqlite';
  readonly lexicalRules = SQLITE_LEXICAL_RULES;
  protected readonly identifierQuote = ['"', '"'] as const;

  /**
   * Creates a new SqliteDialect instance
   */
  public constructor() {
    super(RESERVED_WORDS.sqlite);
  }
}
