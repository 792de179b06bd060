import type { CteScope } from '../core/ast/cte-scope.js';
import type { ParsedQuery, TableNode } from '../core/ast/query.js';
import type { IdentifierNode, TableIdentifier } from '../core/ast/types.js';
import { toTableIdentifier, formatTableIdentifier } from '../core/ast/builders.js';
import { walkTableReferences } from '../core/ast/table-walker.js';
import type { Dialect } from '../core/dialect/abstract.js';
import { resolveDialectInput, type DialectKey } from '../core/dialect/dialect-factory.js';
import { TableRewriteError } from '../core/errors.js';
import { parseSelect } from '../core/parser/index.js';
import { normalizeDecision, type SlotDecision, type TableIdentifierHandler } from './decision.js';
import { reconstructIdentifier } from './quoting.js';
import type { RewriteLogger } from './rewrite-logger.js';

export interface RewriterOptions {
  /** Dialect instance or registered key; defaults to spark */
  dialect?: Dialect | DialectKey;
  /** Also pass bare table names (no database) to the handler, except CTE names in scope */
  includeUnqualified?: boolean;
  /** Receives one entry per table reference */
  logger?: RewriteLogger;
}

type Component = 'catalog' | 'schema' | 'name';

const COMPONENT_LABELS: Record<Component, string> = { catalog: 'catalog', schema: 'database', name: 'table name' };

/**
 * Rewrites the table identifiers of SELECT queries through a replacement handler.
 *
 * Every table reference with a database qualifier is handed to the handler as
 * (catalog, database, name); the returned decision is applied to the reference in place.
 */
export class TableIdentifierRewriter {
  readonly dialect: Dialect;
  private readonly includeUnqualified: boolean;
  private readonly logger?: RewriteLogger;

  constructor(
    private readonly handler: TableIdentifierHandler,
    options: RewriterOptions = {}
  ) {
    this.dialect = resolveDialectInput(options.dialect);
    this.includeUnqualified = options.includeUnqualified ?? false;
    this.logger = options.logger;
  }

  /**
   * Parses, rewrites and renders one statement
   * @param sql - A single SELECT statement
   * @returns The statement text with the changed table names replaced
   * @throws SqlParseError when the text does not parse
   * @throws TableRewriteError when a decision cannot be applied
   */
  rewrite(sql: string): string {
    const query = parseSelect(sql, this.dialect);
    this.rewriteQuery(query);
    return this.dialect.renderQuery(query);
  }

  /**
   * Applies the handler to every resolvable table reference of an already parsed query.
   * Table nodes are mutated in place; references handled before a failing one keep their new names.
   */
  rewriteQuery(query: ParsedQuery): ParsedQuery {
    walkTableReferences(query, (table, scope) => this.rewriteTable(table, scope));
    return query;
  }

  private rewriteTable(table: TableNode, scope: CteScope): void {
    const before = toTableIdentifier(table);
    const skipReason = this.skipReason(table, scope);
    if (skipReason) {
      this.logger?.({ event: 'skipped', dialect: this.dialect.name, before, reason: skipReason });
      return;
    }

    const decision = normalizeDecision(this.handler(before.catalog, before.database, before.name));
    this.applyDecision(table, before, decision.catalog, decision.database, decision.name);

    if (this.logger) {
      const after = toTableIdentifier(table);
      const event = sameIdentifier(before, after) ? 'unchanged' : 'rewritten';
      this.logger({ event, dialect: this.dialect.name, before, after });
    }
  }

  private skipReason(table: TableNode, scope: CteScope): 'unqualified' | 'cte' | undefined {
    if (table.schema) return undefined;
    if (!this.includeUnqualified) return 'unqualified';
    return scope.has(table.name.name) ? 'cte' : undefined;
  }

  /**
   * Computes every component first and assigns only once the result is known to be valid,
   * so a rejected decision leaves the node as it was.
   */
  private applyDecision(
    table: TableNode,
    before: TableIdentifier,
    catalog: SlotDecision,
    database: SlotDecision,
    name: SlotDecision
  ): void {
    const next = {
      catalog: this.resolveComponent(table, 'catalog', catalog),
      schema: this.resolveComponent(table, 'schema', database),
      name: this.resolveComponent(table, 'name', name)
    };

    const label = formatTableIdentifier(before);
    if (!next.name) {
      throw new TableRewriteError(`Cannot remove the table name of "${label}"`);
    }
    if (next.catalog && !next.schema) {
      throw new TableRewriteError(`Cannot keep catalog "${next.catalog.name}" on "${label}" without a database`);
    }

    table.name = next.name;
    setOptional(table, 'schema', next.schema);
    setOptional(table, 'catalog', next.catalog);
  }

  private resolveComponent(table: TableNode, component: Component, slot: SlotDecision): IdentifierNode | undefined {
    const original = table[component];
    switch (slot.kind) {
      case 'keep':
        return original;
      case 'clear':
        return undefined;
      case 'set':
        if (slot.value.length === 0) {
          const label = formatTableIdentifier(toTableIdentifier(table));
          throw new TableRewriteError(`Empty ${COMPONENT_LABELS[component]} value for "${label}"`);
        }
        return reconstructIdentifier(original, slot.value, this.dialect);
    }
  }
}

const sameIdentifier = (a: TableIdentifier, b: TableIdentifier): boolean =>
  a.catalog === b.catalog && a.database === b.database && a.name === b.name;

const setOptional = (table: TableNode, key: 'catalog' | 'schema', value: IdentifierNode | undefined): void => {
  if (value) {
    table[key] = value;
  } else {
    delete table[key];
  }
};

/**
 * Functional shorthand for a one-off rewrite
 * @example
 * rewriteTableIdentifiers('SELECT * FROM db1.t1', () => ['cat1', KEEP, KEEP])
 * // => 'SELECT * FROM cat1.db1.t1'
 */
export const rewriteTableIdentifiers = (
  sql: string,
  handler: TableIdentifierHandler,
  options?: RewriterOptions
): string => new TableIdentifierRewriter(handler, options).rewrite(sql);
