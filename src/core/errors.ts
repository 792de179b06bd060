/**
 * Location of a token inside the source text.
 * `line` and `column` are 1-based, `offset` is 0-based.
 */
export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

export type SqlToolErrorCode =
  | 'PARSE_ERROR'
  | 'REWRITE_ERROR'
  | 'RENDER_ERROR'
  | 'DIALECT_NOT_REGISTERED';

/**
 * Base class for every error raised by the parser, renderer and rewriter.
 */
export class SqlToolError extends Error {
  readonly code: SqlToolErrorCode;

  constructor(code: SqlToolErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The input is not a valid read query for the active dialect.
 */
export class SqlParseError extends SqlToolError {
  readonly position: SourcePosition;

  constructor(message: string, position: SourcePosition, options?: { cause?: unknown }) {
    super('PARSE_ERROR', `${message} at line ${position.line}, column ${position.column}`, options);
    this.position = position;
  }
}

/**
 * A replacement decision cannot be turned into a valid table reference.
 */
export class TableRewriteError extends SqlToolError {
  constructor(message: string) {
    super('REWRITE_ERROR', message);
  }
}

/**
 * The renderer met a node it cannot serialize.
 */
export class SqlRenderError extends SqlToolError {
  constructor(message: string) {
    super('RENDER_ERROR', message);
  }
}

export class DialectNotRegisteredError extends SqlToolError {
  constructor(key: string) {
    super(
      'DIALECT_NOT_REGISTERED',
      `Dialect "${key}" is not registered. Use DialectFactory.register(...) to register it.`
    );
  }
}
