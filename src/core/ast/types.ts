/**
 * A single identifier as it appeared in the source.
 * `name` is the unescaped value; `quoted` records whether the source
 * delimited it (backticks, double quotes or brackets, depending on dialect).
 */
export interface IdentifierNode {
  type: 'Identifier';
  name: string;
  quoted: boolean;
}

/**
 * Plain-string view of a table reference, as handed to replacement functions
 * and loggers.
 */
export interface TableIdentifier {
  catalog: string | null;
  database: string | null;
  name: string | null;
}

/**
 * Character range in the source text, end exclusive
 */
export interface SourceSpan {
  start: number;
  end: number;
}
