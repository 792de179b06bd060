import { Dialect, STANDARD_LEXICAL_RULES, type LexicalRules } from '../abstract.js';
import { RESERVED_WORDS } from '../reserved-words.js';

const MYSQL_LEXICAL_RULES: LexicalRules = {
  ...STANDARD_LEXICAL_RULES,
  identifierQuotes: [['`', '`']],
  stringQuotes: ["'", '"'],
  backslashEscapes: true,
  hashComments: true
};

/**
 * MySQL dialect implementation
 */
export class MySqlDialect extends Dialect {
  readonly name = 'mysql';
  readonly parserDatabase = 'MySQL';
  readonly lexicalRules = MYSQL_LEXICAL_RULES;
  protected readonly identifierQuote = ['`', '`'] as const;

  /**
   * Creates a new MySqlDialect instance
   */
  public constructor() {
    super(RESERVED_WORDS.mysql);
  }
}
