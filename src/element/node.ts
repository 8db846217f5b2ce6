import type { Deferred } from './deferred';
import type { ElementInstance } from './element';

/** Brand carried by every {@link ElementInstance}. */
export const ELEMENT_BRAND: unique symbol = Symbol.for('tagweave.element');

/**
 * Anything that may appear as a child.
 *
 * `null`, `undefined`, `true` and `false` render nothing, so conditional
 * children (`{cond && <b>x</b>}`) need no special casing.
 */
export type Child =
  | ElementInstance
  | Deferred
  | string
  | number
  | bigint
  | boolean
  | null
  | undefined
  | readonly Child[];

export function isElementInstance(value: unknown): value is ElementInstance {
  return typeof value === 'object' && value !== null && ELEMENT_BRAND in value;
}

/** Children that are skipped at render time. */
export function isEmptyChild(value: unknown): value is boolean | null | undefined {
  return value === null || value === undefined || typeof value === 'boolean';
}
