import { Dialect, STANDARD_LEXICAL_RULES, type LexicalRules } from '../abstract.js';
import { RESERVED_WORDS } from '../reserved-words.js';

/**
 * T-SQL rules. `#` starts temp table names.
 */
const MSSQL_LEXICAL_RULES: LexicalRules = {
  ...STANDARD_LEXICAL_RULES,
  identifierQuotes: [['[', ']'], ['"', '"']],
  identifierStart: /[\p{L}_#]/u,
  identifierPart: /[\p{L}\p{N}_@#$]/u
};

/**
 * Microsoft SQL Server dialect implementation
 */
export class SqlServerDialect extends Dialect {
  readonly name = 'mssql';
  readonly parserDatabase = 'TransactSQL';
  readonly lexicalRules = MSSQL_LEXICAL_RULES;
  protected readonly identifierQuote = ['[', ']'] as const;

  /**
   * Creates a new SqlServerDialect instance
   */
  public constructor() {
    super(RESERVED_WORDS.mssql);
  }
}
