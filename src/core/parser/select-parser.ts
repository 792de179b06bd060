import nodeSqlParser from 'node-sql-parser';
import type { AST } from 'node-sql-parser';

import { buildTableNode } from '../ast/builders.js';
import type { ParsedQuery, TableReference } from '../ast/query.js';
import type { SourceSpan } from '../ast/types.js';
import type { Dialect } from '../dialect/abstract.js';
import { SqlParseError } from '../errors.js';
import { IdentifierScanner, type ScannedName } from './identifier-scanner.js';
import { collectStatementTables, isRecord, type StatementTable } from './statement-tables.js';

const sqlParser = new nodeSqlParser.Parser();

const MAX_TABLE_PARTS = 3;

/** Tokens a table reference follows */
const TABLE_PREDECESSORS: ReadonlySet<string> = new Set(['FROM', 'JOIN', 'STRAIGHT_JOIN', 'ONLY', 'TABLE', ',', '(']);

const sameName = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

const overlaps = (name: ScannedName, span: SourceSpan): boolean => name.start < span.end && span.start < name.end;

/**
 * Whether a dotted name in the text spells the table the parser reported.
 * The parser gives the table name and the component before it; an unqualified
 * reference must be spelled with a single part.
 */
const spellsTable = (name: ScannedName, table: StatementTable): boolean => {
  const last = name.parts[name.parts.length - 1];
  if (name.wildcard || !sameName(last.name, table.name)) return false;
  if (table.qualifier === undefined) return name.parts.length === 1;
  const qualifier = name.parts[name.parts.length - 2];
  return qualifier !== undefined && sameName(qualifier.name, table.qualifier);
};

const errorOffset = (error: unknown): number | undefined => {
  if (!isRecord(error) || !isRecord(error.location) || !isRecord(error.location.start)) return undefined;
  const { offset } = error.location.start;
  return typeof offset === 'number' ? offset : undefined;
};

const statementType = (statement: unknown): string =>
  isRecord(statement) && typeof statement.type === 'string' ? statement.type.toUpperCase() : 'UNKNOWN';

/**
 * Parses one SELECT statement with node-sql-parser and locates each of its
 * table references in the source text.
 */
export class SelectParser {
  private readonly scanner: IdentifierScanner;

  constructor(
    private readonly sql: string,
    private readonly dialect: Dialect
  ) {
    this.scanner = new IdentifierScanner(sql, dialect.lexicalRules);
  }

  /**
   * @throws SqlParseError when the text is not a single valid SELECT
   */
  parseStatement(): ParsedQuery {
    const statement = this.parseSingleStatement();
    const claimed: SourceSpan[] = [];
    let cursor = 0;
    const tables: TableReference[] = collectStatementTables(statement).map(found => {
      const name = this.locateTable(found, found.start ?? cursor, claimed);
      const span = { start: name.start, end: name.end };
      claimed.push(span);
      cursor = name.end;
      return { table: buildTableNode(name.parts, span, this.scanner.positionAt(name.start)), scope: found.scope };
    });
    tables.sort((a, b) => a.table.span.start - b.table.span.start);
    return { type: 'ParsedQuery', sql: this.sql, statement, tables };
  }

  private parseSingleStatement(): AST {
    let result: AST | AST[];
    try {
      result = sqlParser.astify(this.sql, {
        database: this.dialect.parserDatabase,
        parseOptions: { includeLocations: true }
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SqlParseError(message, this.scanner.positionAt(errorOffset(error) ?? 0), { cause: error });
    }

    const statements = (Array.isArray(result) ? result : [result]).filter(
      (statement): statement is AST => statement !== null && statement !== undefined
    );
    if (statements.length !== 1) {
      throw new SqlParseError(`Expected a single statement but found ${statements.length}`, this.scanner.positionAt(0));
    }
    const [statement] = statements;
    const type = statementType(statement);
    if (type !== 'SELECT') {
      throw new SqlParseError(`Expected a SELECT statement but found ${type}`, this.scanner.positionAt(0));
    }
    return statement;
  }

  /**
   * Finds the dotted name of a reported table. The search starts at `from` and falls back
   * to the whole text; names that follow a token no table reference follows are tried last.
   * Names already taken and CTE definitions are never matched.
   */
  private locateTable(table: StatementTable, from: number, claimed: SourceSpan[]): ScannedName {
    const candidate = (name: ScannedName): boolean =>
      spellsTable(name, table) && !claimed.some(span => overlaps(name, span)) && !this.definesCte(name);
    const afterTableToken = (name: ScannedName, previous: string | undefined): boolean =>
      (previous === undefined || TABLE_PREDECESSORS.has(previous)) && candidate(name);
    const end = this.scanner.length;
    const name =
      this.scanner.findQualifiedName(from, end, afterTableToken) ??
      this.scanner.findQualifiedName(0, end, afterTableToken) ??
      this.scanner.findQualifiedName(0, end, candidate);

    if (!name) {
      throw new SqlParseError(`Cannot locate table "${table.name}" in the statement text`, this.scanner.positionAt(from));
    }
    if (name.parts.length > MAX_TABLE_PARTS) {
      throw new SqlParseError(
        `Table name has too many qualifiers (${name.parts.length} parts)`,
        this.scanner.positionAt(name.start)
      );
    }
    return name;
  }

  /** `name AS (` or `name (` opens a CTE body, never a table reference */
  private definesCte(name: ScannedName): boolean {
    const next = this.scanner.skipTrivia(name.end);
    if (this.sql[next] === '(') return true;
    const word = this.scanner.readIdentifier(next);
    if (!word || word.node.quoted || word.node.name.toUpperCase() !== 'AS') return false;
    return this.sql[this.scanner.skipTrivia(word.end)] === '(';
  }
}
