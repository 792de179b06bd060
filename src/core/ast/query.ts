import type { AST } from 'node-sql-parser';

import type { SourcePosition } from '../errors.js';
import type { CteScope } from './cte-scope.js';
import type { IdentifierNode, SourceSpan } from './types.js';

/**
 * Components of a table name.
 * `schema` is the database component of `db.table` and `catalog.db.table`.
 */
export interface TableParts {
  /** Catalog qualifier, only present in three-part names */
  catalog?: IdentifierNode;
  /** Database / schema qualifier */
  schema?: IdentifierNode;
  /** Table name */
  name: IdentifierNode;
}

/**
 * A table reference of the query, located in the source text.
 * The rewriter mutates the components; `original` and `span` stay as parsed.
 */
export interface TableNode extends TableParts {
  type: 'Table';
  /** Components as parsed */
  readonly original: Readonly<TableParts>;
  /** Where the dotted name sits in the source text */
  readonly span: SourceSpan;
  readonly position: SourcePosition;
}

export interface TableReference {
  table: TableNode;
  /** CTE names visible where the reference appears */
  scope: CteScope;
}

/**
 * A parsed read query: its source text, the parser's statement tree,
 * and every table reference of the statement in source order.
 */
export interface ParsedQuery {
  type: 'ParsedQuery';
  sql: string;
  statement: AST;
  tables: TableReference[];
}
