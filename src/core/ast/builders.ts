import type { SourcePosition } from '../errors.js';
import type { IdentifierNode, SourceSpan, TableIdentifier } from './types.js';
import type { TableNode, TableParts } from './query.js';

/**
 * Builds an identifier node
 * @param name - Unescaped identifier value
 * @param quoted - Whether the identifier is rendered with quotes
 */
export const identifier = (name: string, quoted = false): IdentifierNode => ({
  type: 'Identifier',
  name,
  quoted
});

/**
 * Builds a table node from its dotted parts, innermost (table name) last.
 * One part is a bare name, two parts db.table, three parts catalog.db.table.
 */
export const buildTableNode = (
  parts: IdentifierNode[],
  span: SourceSpan,
  position: SourcePosition
): TableNode => {
  if (parts.length === 0 || parts.length > 3) {
    throw new Error(`A table reference has 1 to 3 parts, got ${parts.length}`);
  }
  const components: TableParts = { name: parts[parts.length - 1] };
  if (parts.length >= 2) components.schema = parts[parts.length - 2];
  if (parts.length === 3) components.catalog = parts[0];
  return { type: 'Table', ...components, original: { ...components }, span, position };
};

/**
 * Reads the plain-string components of a table node
 */
export const toTableIdentifier = (table: TableParts): TableIdentifier => ({
  catalog: table.catalog?.name ?? null,
  database: table.schema?.name ?? null,
  name: table.name.name
});

/**
 * Dotted display form of a table identifier, without quoting
 */
export const formatTableIdentifier = (id: TableIdentifier): string =>
  [id.catalog, id.database, id.name].filter((part): part is string => part !== null).join('.');
