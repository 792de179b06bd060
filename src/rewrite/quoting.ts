import type { IdentifierNode } from '../core/ast/types.js';
import { identifier } from '../core/ast/builders.js';
import type { Dialect } from '../core/dialect/abstract.js';

/**
 * Builds the identifier for a component that receives `value`.
 * An unchanged value returns the original node so its quoting survives;
 * a replaced value stays quoted when the original was, and is otherwise
 * quoted only when the dialect cannot spell it bare.
 */
export const reconstructIdentifier = (
  original: IdentifierNode | undefined,
  value: string,
  dialect: Dialect
): IdentifierNode => {
  if (original && original.name === value) return original;
  const quoted = (original?.quoted ?? false) || dialect.needsQuoting(value);
  return identifier(value, quoted);
};
