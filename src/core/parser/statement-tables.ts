import { CteScope } from '../ast/cte-scope.js';

/**
 * A table the parser found in the statement tree
 */
export interface StatementTable {
  /** Table name as the parser reports it, quotes removed */
  name: string;
  /** Component just before the name, when the reference was qualified */
  qualifier?: string;
  /** Offset where the parser located the reference, when it did */
  start?: number;
  scope: CteScope;
}

export type AstRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is AstRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** CTE names come as plain strings or as `{ value }` nodes depending on the grammar */
const readName = (value: unknown): string | undefined => {
  if (typeof value === 'string') return value;
  if (isRecord(value) && typeof value.value === 'string') return value.value;
  return undefined;
};

const readOffset = (loc: unknown): number | undefined => {
  if (!isRecord(loc) || !isRecord(loc.start)) return undefined;
  return typeof loc.start.offset === 'number' ? loc.start.offset : undefined;
};

/** FROM / JOIN items naming a table, as opposed to column references */
const isTableItem = (node: AstRecord): boolean =>
  typeof node.table === 'string' && !('column' in node) && node.type !== 'column_ref';

/**
 * Collects the table references of a node-sql-parser statement tree with the CTE
 * names visible at each. Order follows the tree, not the source text.
 */
export const collectStatementTables = (statement: unknown): StatementTable[] => {
  const tables: StatementTable[] = [];

  const visit = (node: unknown, scope: CteScope): void => {
    if (Array.isArray(node)) {
      node.forEach(item => visit(item, scope));
      return;
    }
    if (!isRecord(node)) return;

    if (node.type === 'select' && Array.isArray(node.with)) {
      visitSelectWithCtes(node, node.with, scope);
      return;
    }
    if (isTableItem(node)) {
      tables.push(readTable(node, scope));
    }
    for (const [key, value] of Object.entries(node)) {
      if (key !== 'loc') visit(value, scope);
    }
  };

  const visitSelectWithCtes = (select: AstRecord, ctes: unknown[], outer: CteScope): void => {
    const names = ctes.map(cte => (isRecord(cte) ? readName(cte.name) : undefined));
    const defined = names.filter((name): name is string => name !== undefined);
    const recursive = ctes.some(cte => isRecord(cte) && cte.recursive === true);

    // a recursive WITH makes every name visible in every body; otherwise each body sees the earlier ones
    ctes.forEach((cte, index) => {
      if (!isRecord(cte)) return;
      const visible = recursive
        ? defined
        : names.slice(0, index).filter((name): name is string => name !== undefined);
      visit(cte.stmt, outer.extend(visible));
    });

    const inner = outer.extend(defined);
    for (const [key, value] of Object.entries(select)) {
      if (key !== 'with' && key !== 'loc') visit(value, inner);
    }
  };

  visit(statement, CteScope.EMPTY);
  return tables;
};

const readTable = (node: AstRecord, scope: CteScope): StatementTable => {
  const table: StatementTable = { name: String(node.table), scope };
  const qualifier = readName(node.schema) ?? readName(node.db);
  if (qualifier) table.qualifier = qualifier;
  const start = readOffset(node.loc);
  if (start !== undefined) table.start = start;
  return table;
};
