import { describe, it, expect } from 'vitest';

import { parseQualifiedName, parseSelect } from '../../src/core/parser/index.js';
import { identifier } from '../../src/core/ast/builders.js';
import type { Dialect } from '../../src/core/dialect/abstract.js';
import { PostgresDialect } from '../../src/core/dialect/postgres/index.js';
import { SparkDialect } from '../../src/core/dialect/spark/index.js';
import { SqlParseError } from '../../src/core/errors.js';

const spark = new SparkDialect();
const postgres = new PostgresDialect();

const spans = (sql: string, dialect: Dialect = spark) =>
  parseSelect(sql, dialect).tables.map(({ table }) => table.span);

describe('parseSelect', () => {
  describe('table references', () => {
    it('splits a three-part name and records where it sits', () => {
      const [{ table }] = parseSelect('SELECT a FROM cat.db.t AS x', postgres).tables;
      expect(table).toMatchObject({
        type: 'Table',
        catalog: identifier('cat'),
        schema: identifier('db'),
        name: identifier('t'),
        span: { start: 14, end: 22 },
        position: { offset: 14, line: 1, column: 15 }
      });
      expect(table.original).toEqual({ catalog: identifier('cat'), schema: identifier('db'), name: identifier('t') });
    });

    it('recovers the quoting of each part', () => {
      const [{ table }] = parseSelect('SELECT * FROM `my-db`.orders o', spark).tables;
      expect(table.schema).toEqual(identifier('my-db', true));
      expect(table.name).toEqual(identifier('orders'));
      expect(table.span).toEqual({ start: 14, end: 28 });
    });

    it('ignores names inside string literals', () => {
      expect(spans("SELECT 'db.t' AS s FROM db.t")).toEqual([{ start: 24, end: 28 }]);
    });

    it('gives each occurrence of a self-join its own span', () => {
      expect(spans('SELECT * FROM db.t AS a JOIN db.t AS b ON a.id = b.id', postgres)).toEqual([
        { start: 14, end: 18 },
        { start: 29, end: 33 }
      ]);
    });

    it('keeps the statement tree of the parser', () => {
      expect(parseSelect('SELECT 1', postgres).statement).toMatchObject({ type: 'select' });
    });
  });

  describe('errors', () => {
    it('rejects statements other than SELECT', () => {
      expect(() => parseSelect('DELETE FROM t', postgres)).toThrow(
        'Expected a SELECT statement but found DELETE at line 1, column 1'
      );
    });

    it('rejects more than one statement', () => {
      expect(() => parseSelect('SELECT 1; SELECT 2', postgres)).toThrow(
        'Expected a single statement but found 2 at line 1, column 1'
      );
    });

    it('wraps syntax errors with their position and cause', () => {
      let caught: unknown;
      try {
        parseSelect('SELECT a\nFROM t WHERE', postgres);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(SqlParseError);
      if (caught instanceof SqlParseError) {
        expect(caught.position.line).toBe(2);
        expect(caught.cause).toBeInstanceOf(Error);
      }
    });
  });
});

describe('parseQualifiedName', () => {
  it('reads quoted parts with the dialect quoting', () => {
    expect(parseQualifiedName('`my-db`.orders', spark)).toEqual({
      parts: [identifier('my-db', true), identifier('orders')],
      wildcard: false
    });
  });

  it('reads a trailing wildcard when allowed', () => {
    expect(parseQualifiedName(' cat.db.* ', spark, { allowWildcard: true })).toEqual({
      parts: [identifier('cat'), identifier('db')],
      wildcard: true
    });
  });

  it('rejects a wildcard otherwise', () => {
    expect(() => parseQualifiedName('db.*', spark)).toThrow('Unexpected "." at line 1, column 3');
  });

  it('rejects trailing text and empty input', () => {
    expect(() => parseQualifiedName('db.t x', spark)).toThrow('Unexpected "x" at line 1, column 6');
    expect(() => parseQualifiedName('  ', spark)).toThrow('Expected an identifier at line 1, column 3');
  });
});
