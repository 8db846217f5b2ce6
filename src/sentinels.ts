/**
 * Marks a prop as "not supplied" even though the caller wrote it, e.g.
 * `<Button size={cond ? 'big' : NotProvided} />`. The default applies, as
 * if the prop were absent.
 */
export const NotProvided: unique symbol = Symbol.for('tagweave.NotProvided');
export type NotProvided = typeof NotProvided;

/** Value of a {@link Ref} that has not been bound yet. */
export const Unset: unique symbol = Symbol.for('tagweave.Unset');
export type Unset = typeof Unset;

export function isNotProvided(value: unknown): value is NotProvided {
  return value === NotProvided;
}

/** `undefined` and {@link NotProvided} both mean "no value supplied". */
export function isSupplied<T>(value: T | NotProvided | undefined): value is T {
  return value !== undefined && value !== NotProvided;
}
