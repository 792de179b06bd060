import { TableRewriteError } from '../core/errors.js';

/**
 * Slot value meaning "leave this component exactly as it is", null-ness included
 */
export const KEEP: unique symbol = Symbol('KEEP');

/**
 * One component of a replacement decision:
 * a string sets the component, null removes that qualification level, KEEP retains it.
 */
export type ReplacementSlot = string | null | typeof KEEP;

/**
 * Decision for one table reference, ordered [catalog, database, name]
 */
export type ReplacementDecision = readonly [catalog: ReplacementSlot, database: ReplacementSlot, name: ReplacementSlot];

/**
 * Caller-supplied replacement function.
 * Receives the current unescaped components; absent components are null.
 */
export type TableIdentifierHandler = (
  catalog: string | null,
  database: string | null,
  name: string | null
) => ReplacementDecision;

export type SlotDecision =
  | { kind: 'keep' }
  | { kind: 'clear' }
  | { kind: 'set'; value: string };

export interface NormalizedDecision {
  catalog: SlotDecision;
  database: SlotDecision;
  name: SlotDecision;
}

/** Decision that leaves a reference untouched */
export const KEEP_ALL: ReplacementDecision = [KEEP, KEEP, KEEP];

const isSlot = (value: unknown): value is ReplacementSlot =>
  value === KEEP || value === null || typeof value === 'string';

const normalizeSlot = (slot: ReplacementSlot): SlotDecision => {
  if (slot === KEEP) return { kind: 'keep' };
  if (slot === null) return { kind: 'clear' };
  return { kind: 'set', value: slot };
};

/**
 * Checks a handler result and turns it into tagged slot decisions
 * @throws TableRewriteError when the result is not a 3-tuple of slots
 */
export const normalizeDecision = (decision: unknown): NormalizedDecision => {
  if (!Array.isArray(decision) || decision.length !== 3) {
    throw new TableRewriteError('A replacement decision must be a [catalog, database, name] tuple');
  }
  const [catalog, database, name]: unknown[] = decision;
  if (!isSlot(catalog) || !isSlot(database) || !isSlot(name)) {
    throw new TableRewriteError('Each decision slot must be a string, null or KEEP');
  }
  return {
    catalog: normalizeSlot(catalog),
    database: normalizeSlot(database),
    name: normalizeSlot(name)
  };
};
