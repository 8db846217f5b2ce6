export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  symbol: symbol;
  undefined: undefined;
};

/**
 * Creates a guard for a built-in primitive `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The primitive type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/**
 * Guard verifying the value is a finite number.
 *
 * Semantics:
 * - true  for:  0, 1, -1, 1.5, -0
 * - false for:  NaN, Infinity, -Infinity, non-numbers
 */
export function isFiniteValue(value: unknown): value is number {
  return isNumber(value) && Number.isFinite(value);
}

/**
 * Map for complex runtime categories to concrete TypeScript types.
 */
type ComplexTypeMap = {
  object: Record<string, unknown>;
  function: (...args: never[]) => unknown;
  array: unknown[];
};

/**
 * Creates a guard verifying the given value matches a complex runtime category.
 *
 * Notes:
 * - `"object"` excludes `null` and arrays.
 * - `"array"` uses `Array.isArray`.
 * - `"function"` uses `typeof === "function"`.
 */
export function isComplex<T extends keyof ComplexTypeMap>(
  type: T
): Guard<ComplexTypeMap[T]> {
  return (value: unknown): value is ComplexTypeMap[T] => {
    if (value === null) return false;

    if (type === 'array') {
      return Array.isArray(value);
    }

    if (type === 'object') {
      return typeof value === 'object' && !Array.isArray(value);
    }

    if (type === 'function') {
      return typeof value === 'function';
    }

    return false;
  };
}

/** Guard verifying the value is a non-null object (excluding arrays). */
export const isObject = isComplex('object');

/** Guard verifying the value is a function. */
export const isFunction = isComplex('function');

/** Guard verifying the value is an array. */
export const isArray = isComplex('array');

/**
 * Creates a guard verifying the value is an array whose elements all satisfy `elementGuard`.
 */
export function isArrayOf<T>(elementGuard: Guard<T>): Guard<T[]> {
  return (value: unknown): value is T[] =>
    isArray(value) && value.every(elementGuard);
}

/**
 * Narrowing helper for "object-like" values (non-null `object`, arrays
 * included), so properties can be read without assertions.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Determines whether a value is a plain object (object literal or
 * `Object.create(null)`).
 *
 * Props bags must be plain: class instances, arrays and boxed values are
 * rejected by this check.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<PropertyKey, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Creates a guard accepting exactly the listed literal values
 * (compared with `Object.is`, so `NaN` matches itself and `-0` differs from `0`).
 */
export function isOneOf<const T extends readonly unknown[]>(
  values: T
): Guard<T[number]> {
  return (value: unknown): value is T[number] =>
    values.some(candidate => Object.is(candidate, value));
}
