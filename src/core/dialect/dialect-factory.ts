import type { Dialect } from './abstract.js';
import { SparkDialect } from './spark/index.js';
import { PostgresDialect } from './postgres/index.js';
import { MySqlDialect } from './mysql/index.js';
import { SqliteDialect } from './sqlite/index.js';
import { SqlServerDialect } from './mssql/index.js';
import { DialectNotRegisteredError } from '../errors.js';

export type DialectKey =
  | 'spark'
  | 'postgres'
  | 'mysql'
  | 'sqlite'
  | 'mssql'
  | (string & {}); // registered custom dialects

/** Dialect used when none is configured */
export const DEFAULT_DIALECT: DialectKey = 'spark';

type DialectFactoryFn = () => Dialect;

/**
 * Maps dialect keys to factories. The built-in dialects are registered up front;
 * `register` adds a key or replaces a built-in.
 */
export class DialectFactory {
  private static readonly registry = new Map<DialectKey, DialectFactoryFn>([
    ['spark', () => new SparkDialect()],
    ['postgres', () => new PostgresDialect()],
    ['mysql', () => new MySqlDialect()],
    ['sqlite', () => new SqliteDialect()],
    ['mssql', () => new SqlServerDialect()]
  ]);

  /**
   * @example
   * DialectFactory.register('warehouse', () => new WarehouseDialect());
   */
  public static register(key: DialectKey, factory: DialectFactoryFn): void {
    this.registry.set(key, factory);
  }

  /**
   * @throws DialectNotRegisteredError when nothing is registered under `key`
   */
  public static create(key: DialectKey): Dialect {
    const factory = this.registry.get(key);
    if (!factory) {
      throw new DialectNotRegisteredError(key);
    }
    return factory();
  }
}

/**
 * Normalizes either a Dialect instance OR a key into a Dialect instance.
 * No input means the default dialect.
 */
export const resolveDialectInput = (
  dialect: Dialect | DialectKey = DEFAULT_DIALECT
): Dialect => (typeof dialect === 'string' ? DialectFactory.create(dialect) : dialect);
