import { VENDOR, failure, success, type PropTypeLike } from './schema';
import { describeValue } from '../errors';

/**
 * - `plain`: a typed prop, optionally required or defaulted.
 * - `choices`: value must be one of a fixed list.
 * - `default-choices`: like `choices`, defaulting to the first entry;
 *   never required.
 */
export type PropKind = 'plain' | 'choices' | 'default-choices';

/**
 * Declaration of one prop.
 *
 * Built with {@link prop}, {@link required}, {@link choices} and
 * {@link defaultChoices}; a bare type in a declaration map is shorthand for
 * an optional prop of that type.
 */
export interface PropSpec<T = unknown> {
  readonly kind: PropKind;
  readonly type: PropTypeLike<T>;
  readonly required: boolean;
  readonly hasDefault: boolean;
  readonly default?: T;
  /** Builds a fresh default per instance (for arrays, objects, ...). */
  readonly factory?: () => T;
  readonly choices?: readonly T[];
}

export interface PropOptions<T> {
  required?: boolean;
  default?: T;
  factory?: () => T;
}

export function prop<T>(
  type: PropTypeLike<T>,
  options: PropOptions<T> = {}
): PropSpec<T> {
  const spec: PropSpec<T> = {
    kind: 'plain',
    type,
    required: options.required ?? false,
    hasDefault: 'default' in options,
    default: options.default,
    factory: options.factory
  };
  return Object.freeze(spec);
}

/**
 * Marks a prop as required. Accepts a type or an existing spec; a spec that
 * also has a default is rejected when its table is defined.
 */
export function required<T>(
  typeOrSpec: PropTypeLike<T> | PropSpec<T>
): PropSpec<T> {
  const spec = isPropSpec(typeOrSpec) ? typeOrSpec : prop(typeOrSpec);
  const requiredSpec: PropSpec<T> = { ...spec, required: true };
  return Object.freeze(requiredSpec);
}

export interface ChoicesOptions<T> extends PropOptions<T> {
  /**
   * Type each supplied value must also satisfy. Without it, membership in
   * the list is the only check.
   */
  type?: PropTypeLike<T>;
}

/**
 * A prop restricted to `values`.
 *
 * @example
 * ```ts
 * size: choices(['sm', 'md', 'lg'], { default: 'md' })
 * ```
 */
export function choices<const T>(
  values: readonly T[],
  options: ChoicesOptions<T> = {}
): PropSpec<T> {
  const spec: PropSpec<T> = {
    kind: 'choices',
    type: options.type ?? memberOf(values),
    required: options.required ?? false,
    hasDefault: 'default' in options,
    default: options.default,
    factory: options.factory,
    choices: Object.freeze([...values])
  };
  return Object.freeze(spec);
}

/**
 * A choice prop whose default is the first of `values`.
 */
export function defaultChoices<const T>(
  values: readonly T[],
  options: Pick<ChoicesOptions<T>, 'type'> = {}
): PropSpec<T> {
  const [first] = values;
  const spec: PropSpec<T> = {
    kind: 'default-choices',
    type: options.type ?? memberOf(values),
    required: false,
    hasDefault: values.length > 0,
    default: first,
    choices: Object.freeze([...values])
  };
  return Object.freeze(spec);
}

export function isPropSpec(value: unknown): value is PropSpec {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    'type' in value &&
    !('~standard' in value)
  );
}

/** Type accepting exactly the listed values (compared with `Object.is`). */
function memberOf<T>(values: readonly T[]): PropTypeLike<T> {
  return {
    '~standard': {
      version: 1,
      vendor: VENDOR,
      validate: value => {
        for (const candidate of values) {
          if (Object.is(candidate, value)) return success(candidate);
        }
        return failure(`${describeValue(value)} is not one of the choices`);
      }
    }
  };
}
