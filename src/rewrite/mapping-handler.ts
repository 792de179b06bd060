import type { Dialect } from '../core/dialect/abstract.js';
import { resolveDialectInput, type DialectKey } from '../core/dialect/dialect-factory.js';
import { TableRewriteError } from '../core/errors.js';
import { parseQualifiedName } from '../core/parser/index.js';
import { KEEP, KEEP_ALL, type ReplacementDecision, type TableIdentifierHandler } from './decision.js';

/**
 * Source name to target name, e.g.
 * `{ 'sales.orders': 'archive.orders_2023', 'staging.*': 'prod' }`
 */
export type MappingRules = Readonly<Record<string, string>>;

export interface MappingHandlerOptions {
  /** Dialect whose quoting rules apply to rule keys and targets; defaults to spark */
  dialect?: Dialect | DialectKey;
}

interface CompiledRules {
  exactThreePart: Map<string, ReplacementDecision>;
  exactTwoPart: Map<string, ReplacementDecision>;
  catalogWildcard: Map<string, ReplacementDecision>;
  databaseWildcard: Map<string, ReplacementDecision>;
}

const key = (...parts: string[]): string => parts.map(part => part.toLowerCase()).join('\u0000');

const tableTarget = (parts: string[]): ReplacementDecision => {
  switch (parts.length) {
    case 1:
      return [KEEP, KEEP, parts[0]];
    case 2:
      return [KEEP, parts[0], parts[1]];
    default:
      return [parts[0], parts[1], parts[2]];
  }
};

const namespaceTarget = (parts: string[]): ReplacementDecision =>
  parts.length === 1 ? [KEEP, parts[0], KEEP] : [parts[0], parts[1], KEEP];

const compileRules = (rules: MappingRules, dialect: Dialect): CompiledRules => {
  const compiled: CompiledRules = {
    exactThreePart: new Map(),
    exactTwoPart: new Map(),
    catalogWildcard: new Map(),
    databaseWildcard: new Map()
  };

  for (const [source, target] of Object.entries(rules)) {
    const from = parseQualifiedName(source, dialect, { allowWildcard: true });
    const to = parseQualifiedName(target, dialect).parts.map(part => part.name);
    const names = from.parts.map(part => part.name);

    if (from.wildcard) {
      if (to.length > 2) {
        throw new TableRewriteError(`Mapping target "${target}" for "${source}" must name a database or catalog.database`);
      }
      if (names.length === 1) compiled.databaseWildcard.set(key(...names), namespaceTarget(to));
      else if (names.length === 2) compiled.catalogWildcard.set(key(...names), namespaceTarget(to));
      else throw new TableRewriteError(`Mapping source "${source}" has too many parts`);
      continue;
    }

    if (to.length > 3) {
      throw new TableRewriteError(`Mapping target "${target}" for "${source}" has too many parts`);
    }
    if (names.length === 2) compiled.exactTwoPart.set(key(...names), tableTarget(to));
    else if (names.length === 3) compiled.exactThreePart.set(key(...names), tableTarget(to));
    else throw new TableRewriteError(`Mapping source "${source}" must be db.table, catalog.db.table, db.* or catalog.db.*`);
  }
  return compiled;
};

/**
 * Builds a handler from a table of renames.
 *
 * Lookup order, most specific first: catalog.db.table, db.table, catalog.db.*, db.*.
 * Names compare case-insensitively. A table target replaces the components it names
 * (`t2` renames the table, `db2.t2` also moves it, `cat.db2.t2` sets all three);
 * a wildcard target replaces only the namespace. Unmatched references are kept.
 * @throws SqlParseError when a key or target is not a dotted name
 * @throws TableRewriteError when a key or target has the wrong number of parts
 */
export const createMappingHandler = (
  rules: MappingRules,
  options: MappingHandlerOptions = {}
): TableIdentifierHandler => {
  const compiled = compileRules(rules, resolveDialectInput(options.dialect));

  return (catalog, database, name) => {
    if (database === null || name === null) return KEEP_ALL;
    if (catalog !== null) {
      const exact = compiled.exactThreePart.get(key(catalog, database, name));
      if (exact) return exact;
    }
    const twoPart = compiled.exactTwoPart.get(key(database, name));
    if (twoPart) return twoPart;
    if (catalog !== null) {
      const namespace = compiled.catalogWildcard.get(key(catalog, database));
      if (namespace) return namespace;
    }
    return compiled.databaseWildcard.get(key(database)) ?? KEEP_ALL;
  };
};
