import { identifier } from '../ast/builders.js';
import type { IdentifierNode } from '../ast/types.js';
import type { LexicalRules } from '../dialect/abstract.js';
import { SqlParseError, type SourcePosition } from '../errors.js';

/**
 * Dotted name read from the source text
 */
export interface ScannedName {
  parts: IdentifierNode[];
  /** Whether the name ended in `.*` */
  wildcard: boolean;
  start: number;
  end: number;
}

/**
 * Reads identifiers and dotted names out of SQL text with a dialect's quoting rules.
 * node-sql-parser reports table names without their quotes; this recovers the
 * quoting and the exact extent of each name.
 */
export class IdentifierScanner {
  private readonly bareWord: RegExp;

  constructor(
    private readonly sql: string,
    private readonly rules: LexicalRules
  ) {
    this.bareWord = new RegExp(`${rules.identifierStart.source}${rules.identifierPart.source}*`, 'uy');
  }

  get length(): number {
    return this.sql.length;
  }

  positionAt(offset: number): SourcePosition {
    const before = this.sql.slice(0, offset);
    const lineStart = before.lastIndexOf('\n') + 1;
    return {
      offset,
      line: before.split('\n').length,
      column: offset - lineStart + 1
    };
  }

  /**
   * Skips whitespace and comments
   * @returns Offset of the next significant character
   */
  skipTrivia(offset: number): number {
    let pos = offset;
    while (pos < this.sql.length) {
      if (/\s/.test(this.sql[pos])) {
        pos += 1;
      } else if (this.sql.startsWith('--', pos) || (this.rules.hashComments && this.sql[pos] === '#')) {
        const newline = this.sql.indexOf('\n', pos);
        pos = newline < 0 ? this.sql.length : newline + 1;
      } else if (this.sql.startsWith('/*', pos)) {
        const close = this.sql.indexOf('*/', pos + 2);
        pos = close < 0 ? this.sql.length : close + 2;
      } else {
        break;
      }
    }
    return pos;
  }

  /**
   * Reads one bare or quoted identifier starting exactly at `offset`
   * @throws SqlParseError on an unterminated quoted identifier
   */
  readIdentifier(offset: number): { node: IdentifierNode; end: number } | undefined {
    for (const [open, close] of this.rules.identifierQuotes) {
      if (this.sql.startsWith(open, offset)) {
        return this.readQuoted(offset, open, close);
      }
    }
    this.bareWord.lastIndex = offset;
    const match = this.bareWord.exec(this.sql);
    if (!match) return undefined;
    return { node: identifier(match[0]), end: offset + match[0].length };
  }

  /**
   * Reads `part(.part)*` starting at `offset`, whitespace and comments allowed around the dots
   * @param allowWildcard - Also accept a trailing `.*`
   */
  readQualifiedName(offset: number, allowWildcard = false): ScannedName | undefined {
    const first = this.readIdentifier(offset);
    if (!first) return undefined;

    const parts = [first.node];
    let end = first.end;
    let wildcard = false;
    for (;;) {
      const dot = this.skipTrivia(end);
      if (this.sql[dot] !== '.') break;
      const next = this.skipTrivia(dot + 1);
      if (allowWildcard && this.sql[next] === '*') {
        wildcard = true;
        end = next + 1;
        break;
      }
      const part = this.readIdentifier(next);
      if (!part) break;
      parts.push(part.node);
      end = part.end;
    }
    return { parts, wildcard, start: offset, end };
  }

  /**
   * First dotted name starting in [from, to) that `accept` takes.
   * `accept` also receives the token before the name, upper-cased, when there is one.
   */
  findQualifiedName(
    from: number,
    to: number,
    accept: (name: ScannedName, previous: string | undefined) => boolean
  ): ScannedName | undefined {
    let offset = from;
    let previous: string | undefined;
    while (offset < to) {
      const start = this.skipTrivia(offset);
      if (start >= to) return undefined;
      const name = this.readQualifiedName(start);
      if (name && accept(name, previous)) return name;
      offset = name ? name.end : this.skipToken(start);
      previous = this.sql.slice(start, offset).toUpperCase();
    }
    return undefined;
  }

  /**
   * Offset just past the token at `offset`: a string literal, an identifier or one character
   */
  private skipToken(offset: number): number {
    const quote = this.rules.stringQuotes.find(q => this.sql.startsWith(q, offset));
    if (quote) return this.skipString(offset, quote);
    return this.readIdentifier(offset)?.end ?? offset + 1;
  }

  private skipString(offset: number, quote: string): number {
    let pos = offset + 1;
    while (pos < this.sql.length) {
      const ch = this.sql[pos];
      if (this.rules.backslashEscapes && ch === '\\') {
        pos += 2;
      } else if (ch === quote) {
        if (this.sql[pos + 1] !== quote) return pos + 1;
        pos += 2;
      } else {
        pos += 1;
      }
    }
    return this.sql.length;
  }

  private readQuoted(offset: number, open: string, close: string): { node: IdentifierNode; end: number } {
    let value = '';
    let pos = offset + open.length;
    while (pos < this.sql.length) {
      if (this.sql.startsWith(close, pos)) {
        if (!this.sql.startsWith(close, pos + close.length)) {
          return { node: identifier(value, true), end: pos + close.length };
        }
        value += close;
        pos += close.length * 2;
      } else {
        value += this.sql[pos];
        pos += 1;
      }
    }
    throw new SqlParseError('Unterminated quoted identifier', this.positionAt(offset));
  }
}
