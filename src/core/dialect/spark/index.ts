import { Dialect, STANDARD_LEXICAL_RULES, type LexicalRules } from '../abstract.js';
import { RESERVED_WORDS } from '../reserved-words.js';

/**
 * Spark SQL rules: backtick identifiers, both quote styles for strings
 * and backslash escapes
 */
const SPARK_LEXICAL_RULES: LexicalRules = {
  ...STANDARD_LEXICAL_RULES,
  identifierQuotes: [['`', '`']],
  stringQuotes: ["'", '"'],
  backslashEscapes: true,
  identifierPart: /[\p{L}\p{N}_]/u
};

/**
 * Spark SQL dialect implementation, the default dialect.
 * Statements are parsed with node-sql-parser's Hive grammar, which Spark SQL derives from.
 */
export class SparkDialect extends Dialect {
  readonly name = 'spark';
  readonly parserDatabase = 'Hive';
  readonly lexicalRules = SPARK_LEXICAL_RULES;
  protected readonly identifierQuote = ['`', '`'] as const;

  public constructor() {
    super(RESERVED_WORDS.spark);
  }
}
