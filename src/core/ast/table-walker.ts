import type { CteScope } from './cte-scope.js';
import type { ParsedQuery, TableNode } from './query.js';

export type TableReferenceVisitor = (table: TableNode, scope: CteScope) => void;

/**
 * Calls `visit` once for every table reference of the query, in source order.
 * References come from CTE bodies, derived tables, joins, set operation operands
 * and subqueries nested in expressions alike. The walk itself never mutates the query.
 * @param query - Parsed query to walk
 * @param visit - Receives each table node and the CTE names visible at its position
 */
export const walkTableReferences = (query: ParsedQuery, visit: TableReferenceVisitor): void => {
  for (const { table, scope } of query.tables) {
    visit(table, scope);
  }
};

/**
 * Lists every table reference of the query in source order
 */
export const collectTableReferences = (query: ParsedQuery): TableNode[] => {
  const tables: TableNode[] = [];
  walkTableReferences(query, table => tables.push(table));
  return tables;
};
