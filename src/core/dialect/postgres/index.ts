import { Dialect, STANDARD_LEXICAL_RULES } from '../abstract.js';
import { RESERVED_WORDS } from '../reserved-words.js';

/**
 * PostgreSQL dialect implementation.
 * Unquoted names fold to lower case, so a new value with upper-case letters is written quoted.
 */
export class PostgresDialect extends Dialect {
  readonly name = 'postgres';
  readonly parserDatabase = 'PostgresQL';
  readonly lexicalRules = STANDARD_LEXICAL_RULES;
  protected readonly identifierQuote = ['"', '"'] as const;
  protected readonly foldsUnquotedToLowerCase = true;

  /**
   * Creates a new PostgresDialect instance
   */
  public constructor() {
    super(RESERVED_WORDS.postgres);
  }
}
