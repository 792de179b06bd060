import type { TableIdentifier } from '../core/ast/types.js';

export type RewriteEvent = 'skipped' | 'unchanged' | 'rewritten';

/**
 * Represents what happened to a single table reference
 */
export interface RewriteLogEntry {
  event: RewriteEvent;
  /** Name of the dialect the query was parsed with */
  dialect: string;
  /** Components as they were before the handler ran */
  before: TableIdentifier;
  /** Components after rewriting; absent for skipped references */
  after?: TableIdentifier;
  /** Why a reference was skipped */
  reason?: 'unqualified' | 'cte';
}

/**
 * Function type for rewrite logging callbacks
 * @param entry - The rewrite log entry to process
 */
export type RewriteLogger = (entry: RewriteLogEntry) => void;

/**
 * Collects entries into an array, handy in tests and dry runs
 */
export const createCollectingLogger = (): { logger: RewriteLogger; entries: RewriteLogEntry[] } => {
  const entries: RewriteLogEntry[] = [];
  return { logger: entry => entries.push(entry), entries };
};
