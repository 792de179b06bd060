import { describe, it, expect } from 'vitest';

import { DialectFactory, resolveDialectInput } from '../../src/core/dialect/dialect-factory.js';
import { Dialect, STANDARD_LEXICAL_RULES } from '../../src/core/dialect/abstract.js';
import { SparkDialect } from '../../src/core/dialect/spark/index.js';
import { SqliteDialect } from '../../src/core/dialect/sqlite/index.js';
import { SqlServerDialect } from '../../src/core/dialect/mssql/index.js';
import { DialectNotRegisteredError } from '../../src/core/errors.js';
import { rewriteTableIdentifiers } from '../../src/rewrite/table-identifier-rewriter.js';
import { KEEP } from '../../src/rewrite/decision.js';

class WarehouseDialect extends Dialect {
  readonly name = 'warehouse';
  readonly parserDatabase = 'PostgresQL';
  readonly lexicalRules = STANDARD_LEXICAL_RULES;
  protected readonly identifierQuote = ['"', '"'] as const;

  constructor() {
    super(['STAGE']);
  }
}

describe('DialectFactory', () => {
  it('resolves the built-in dialects', () => {
    expect(DialectFactory.create('sqlite')).toBeInstanceOf(SqliteDialect);
    expect(DialectFactory.create('mssql')).toBeInstanceOf(SqlServerDialect);
    expect(DialectFactory.create('spark').name).toBe('spark');
  });

  it('creates a fresh instance per call', () => {
    expect(DialectFactory.create('postgres')).not.toBe(DialectFactory.create('postgres'));
  });

  it('throws for an unknown key', () => {
    expect(() => DialectFactory.create('oracle')).toThrow(DialectNotRegisteredError);
    expect(() => DialectFactory.create('oracle')).toThrow(
      'Dialect "oracle" is not registered. Use DialectFactory.register(...) to register it.'
    );
  });

  it('lets a registration override a built-in', () => {
    DialectFactory.register('sqlite', () => new WarehouseDialect());
    try {
      expect(DialectFactory.create('sqlite')).toBeInstanceOf(WarehouseDialect);
    } finally {
      DialectFactory.register('sqlite', () => new SqliteDialect());
    }
  });

  it('makes a registered dialect usable by key', () => {
    DialectFactory.register('warehouse', () => new WarehouseDialect());
    expect(rewriteTableIdentifiers('SELECT * FROM db.t', () => [KEEP, 'stage', KEEP], { dialect: 'warehouse' })).toBe(
      'SELECT * FROM "stage".t'
    );
  });
});

describe('resolveDialectInput', () => {
  it('defaults to spark', () => {
    expect(resolveDialectInput()).toBeInstanceOf(SparkDialect);
  });

  it('returns a dialect instance as given', () => {
    const dialect = new WarehouseDialect();
    expect(resolveDialectInput(dialect)).toBe(dialect);
  });
});
