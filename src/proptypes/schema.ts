import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isRecord, isString } from '../utils/type-guards';

export const VENDOR = 'tagweave';

/**
 * A prop type: a Standard Schema V1 validator with a display name.
 *
 * Built-in types are created with {@link createPropType}; any third-party
 * Standard Schema (Zod, Valibot, ArkType, ...) is accepted wherever a
 * `PropTypeLike` is, and is named after its vendor in messages.
 */
export interface PropType<T = unknown> extends StandardSchemaV1<unknown, T> {
  /** Shown in error messages (`expected <typeName>`). */
  readonly typeName: string;
  /**
   * Boolean props are normalized from markup spellings in every mode and
   * render as bare attributes.
   */
  readonly isBoolean: boolean;
}

export type PropTypeLike<T = unknown> = StandardSchemaV1<unknown, T>;

export type Check<T> = (value: unknown) => StandardSchemaV1.Result<T>;

export function createPropType<T>(
  typeName: string,
  check: Check<T>,
  options: { isBoolean?: boolean } = {}
): PropType<T> {
  const type: PropType<T> = {
    typeName,
    isBoolean: options.isBoolean ?? false,
    '~standard': { version: 1, vendor: VENDOR, validate: check }
  };
  return Object.freeze(type);
}

export function success<T>(value: T): StandardSchemaV1.SuccessResult<T> {
  return { value };
}

export function failure(message: string): StandardSchemaV1.FailureResult {
  return { issues: [{ message }] };
}

/** Whether the value carries the Standard Schema `~standard` adapter. */
export function isStandardSchema(value: unknown): value is PropTypeLike {
  return (
    isRecord(value) &&
    '~standard' in value &&
    isRecord(value['~standard']) &&
    typeof value['~standard'].validate === 'function'
  );
}

export function typeNameOf(type: PropTypeLike): string {
  if ('typeName' in type && isString(type.typeName)) return type.typeName;
  return `${type['~standard'].vendor} schema`;
}

export function isBooleanType(type: PropTypeLike): boolean {
  return 'isBoolean' in type && type.isBoolean === true;
}

export type SchemaOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; message: string };

/**
 * Runs a Standard Schema V1 validator synchronously.
 *
 * About `~standard`:
 * - It acts as a universal adapter: validators report `{ value }` or
 *   `{ issues }` instead of throwing, so built-in and third-party prop types
 *   are handled the same way.
 * - Some validators only report issues and return no decoded `value`; the
 *   input is then kept as is.
 *
 * @throws If the validator returns a Promise (element instantiation is
 *   synchronous, so asynchronous validation cannot be awaited).
 */
export function validateWithSchema<T>(
  schema: PropTypeLike<T>,
  input: unknown,
  label: string
): SchemaOutcome<T>;

export function validateWithSchema(
  schema: PropTypeLike,
  input: unknown,
  label: string
): SchemaOutcome<unknown> {
  const result = schema['~standard'].validate(input);

  if (result instanceof Promise) {
    throw new Error(
      `[tagweave] Async schema validation is not supported for ${label}.`
    );
  }

  // Handle the result pattern: issues must be checked manually.
  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    const path = firstIssue.path
      ?.map(segment => (isRecord(segment) ? String(segment.key) : String(segment)))
      .join('.');
    return {
      ok: false,
      message: path ? `${path}: ${firstIssue.message}` : firstIssue.message
    };
  }

  return { ok: true, value: 'value' in result ? result.value : input };
}
