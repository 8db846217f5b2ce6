import { isDeferred } from '../element/deferred';
import type { ElementInstance } from '../element/element';
import { isElementInstance, type Child } from '../element/node';
import { Ref } from '../element/ref';
import { describeValue } from '../errors';
import {
  isArray,
  isFiniteValue,
  isFunction,
  isObject
} from '../utils/type-guards';
import {
  createPropType,
  failure,
  success,
  type PropType,
  type PropTypeLike,
  typeNameOf,
  validateWithSchema
} from './schema';

const expected = (what: string, value: unknown) =>
  failure(`expected ${what}, received ${describeValue(value)}`);

const stringType = createPropType<string>('string', value => {
  if (typeof value === 'string') return success(value);
  // Numbers are accepted and stringified (`<input size="3">` becomes 3).
  if (isFiniteValue(value)) return success(String(value));
  return expected('a string', value);
});

const numberType = createPropType<number>('number', value =>
  typeof value === 'number' && !Number.isNaN(value)
    ? success(value)
    : expected('a number', value)
);

const integerType = createPropType<number>('integer', value =>
  Number.isInteger(value) && typeof value === 'number'
    ? success(value)
    : expected('an integer', value)
);

const booleanType = createPropType<boolean>(
  'boolean',
  value =>
    typeof value === 'boolean' ? success(value) : expected('a boolean', value),
  { isBoolean: true }
);

const funcType = createPropType<(...args: never[]) => unknown>(
  'function',
  value => (isFunction(value) ? success(value) : expected('a function', value))
);

const anyType = createPropType<unknown>('any', value => success(value));

const objectType = createPropType<Record<string, unknown>>('object', value =>
  isObject(value) ? success(value) : expected('an object', value)
);

const elementType = createPropType<ElementInstance>('element', value =>
  isElementInstance(value) ? success(value) : expected('an element', value)
);

const nodeType = createPropType<Child>('node', value =>
  isNode(value) ? success(value) : expected('a renderable node', value)
);

const refType = createPropType<Ref<unknown>>('ref', value =>
  value instanceof Ref ? success(value) : expected('a Ref', value)
);

/**
 * Renderable values: text, numbers, elements, deferred leaves, arrays of
 * those, and `null`/`undefined`/booleans (which render nothing).
 */
export function isNode(value: unknown): value is Child {
  if (value === null || value === undefined) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return true;
    case 'object':
      if (isArray(value)) return value.every(isNode);
      return isElementInstance(value) || isDeferred(value);
    default:
      return false;
  }
}

/** Array of any values, or of values accepted by `item`. */
function array(): PropType<unknown[]>;
function array<T>(item: PropTypeLike<T>): PropType<T[]>;
function array(item?: PropTypeLike): PropType<unknown[]> {
  const typeName = item ? `array of ${typeNameOf(item)}` : 'array';
  return createPropType<unknown[]>(typeName, value => {
    if (!isArray(value)) return expected('an array', value);
    if (!item) return success(value);

    const items: unknown[] = [];
    for (const [index, entry] of value.entries()) {
      const outcome = validateWithSchema(item, entry, typeName);
      if (!outcome.ok) {
        return failure(`[${index}] ${outcome.message}`);
      }
      items.push(outcome.value);
    }
    return success(items);
  });
}

/** Instances of `ctor` (checked with `instanceof`). */
function instanceOf<T>(ctor: abstract new (...args: never[]) => T): PropType<T> {
  const name = ctor.name || 'anonymous class';
  return createPropType<T>(name, value =>
    value instanceof ctor ? success(value) : expected(`an instance of ${name}`, value)
  );
}

/** The first of `members` that accepts the value wins (with its coercion). */
function oneOfType<const M extends readonly PropTypeLike[]>(
  ...members: M
): PropType<InferMember<M[number]>>;
function oneOfType(...members: PropTypeLike[]): PropType<unknown> {
  const typeName = members.map(typeNameOf).join(' | ');
  return createPropType<unknown>(typeName, value => {
    for (const member of members) {
      const outcome = validateWithSchema(member, value, typeName);
      if (outcome.ok) return success(outcome.value);
    }
    return expected(typeName, value);
  });
}

type InferMember<M> = M extends PropTypeLike<infer T> ? T : never;

/** `null` or a value accepted by `type`. */
function nullable<T>(type: PropTypeLike<T>): PropType<T | null> {
  const typeName = `${typeNameOf(type)} | null`;
  return createPropType<T | null>(typeName, value => {
    if (value === null) return success(null);
    const outcome = validateWithSchema(type, value, typeName);
    return outcome.ok ? success(outcome.value) : failure(outcome.message);
  });
}

/**
 * Built-in prop types.
 *
 * @example
 * ```ts
 * const propTypes = definePropTypes('Avatar', {
 *   src: required(types.string),
 *   size: prop(types.integer, { default: 32 }),
 *   rounded: types.boolean
 * });
 * ```
 */
export const types = Object.freeze({
  string: stringType,
  number: numberType,
  integer: integerType,
  boolean: booleanType,
  func: funcType,
  any: anyType,
  object: objectType,
  element: elementType,
  node: nodeType,
  ref: refType,
  array,
  instanceOf,
  oneOfType,
  nullable
});
