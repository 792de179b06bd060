/**
 * Table identifier rewriting for SQL read queries.
 * Provides the rewrite engine and the dialect-aware parser and renderer.
 */
export * from './core/errors.js';
export * from './core/ast/types.js';
export * from './core/ast/cte-scope.js';
export * from './core/ast/query.js';
export * from './core/ast/builders.js';
export * from './core/ast/table-walker.js';
export * from './core/parser/index.js';
export * from './core/dialect/abstract.js';
export * from './core/dialect/dialect-factory.js';
export * from './core/dialect/spark/index.js';
export * from './core/dialect/mysql/index.js';
export * from './core/dialect/mssql/index.js';
export * from './core/dialect/sqlite/index.js';
export * from './core/dialect/postgres/index.js';
export * from './rewrite/decision.js';
export * from './rewrite/quoting.js';
export * from './rewrite/table-identifier-rewriter.js';
export * from './rewrite/mapping-handler.js';
export * from './rewrite/rewrite-logger.js';
