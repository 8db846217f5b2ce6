import { getConfig } from '../config';
import {
  InvalidChildrenError,
  InvalidPropNameError,
  InvalidPropValueError,
  type PropError,
  RequiredPropError,
  TagweaveError,
  UnsetPropError,
  describeValue
} from '../errors';
import { PropTypesTable, type AnyProps } from '../proptypes/table';
import { isPassthroughPropName, validateProps } from '../proptypes/validate';
import { NotProvided, isSupplied } from '../sentinels';
import { setOwn } from '../utils/object-utils';
import { isArray, isRecord, isString } from '../utils/type-guards';
import { isDeferred } from './deferred';
import { resolveHtmlTag } from './html';
import { Fragment, RawHtml } from './intrinsic';
import { ELEMENT_BRAND, isElementInstance, isEmptyChild, type Child } from './node';
import { Ref } from './ref';
import type {
  ComponentType,
  ContextType,
  ElementType,
  FunctionComponent,
  FunctionComponentType
} from './types';

type PropLookup = { found: true; value: unknown } | { found: false };

const NOT_FOUND: PropLookup = { found: false };

/**
 * One instantiated element: a type, the props supplied (already validated),
 * its children and an optional ref.
 *
 * Instances are immutable once created. Prop reads resolve in this order:
 * 1. the supplied value;
 * 2. the per-instance factory default (built on first read, then reused);
 * 3. the static default;
 * 4. the fallback passed to {@link ElementInstance.prop}, if any;
 * 5. otherwise an error: {@link RequiredPropError} for required props,
 *    {@link UnsetPropError} for optional ones, {@link InvalidPropNameError}
 *    for names the type does not declare.
 */
export class ElementInstance<P extends AnyProps = AnyProps> {
  readonly [ELEMENT_BRAND] = true;
  readonly type: ElementType;
  readonly children: readonly Child[];
  readonly ref: Ref | undefined;

  private readonly supplied: Readonly<AnyProps>;
  private readonly factoryDefaults = new Map<string, unknown>();
  private merged: Readonly<AnyProps> | undefined;

  constructor(
    type: ElementType,
    supplied: Readonly<AnyProps>,
    children: readonly Child[],
    ref?: Ref
  ) {
    this.type = type;
    this.supplied = Object.freeze({ ...supplied });
    this.children = Object.freeze([...children]);
    this.ref = ref;
  }

  get tagName(): string {
    return this.type.name;
  }

  prop<K extends keyof P & string>(name: K): P[K];
  prop<K extends keyof P & string, F>(
    name: K,
    fallback: F
  ): Exclude<P[K], undefined> | F;
  prop(name: string, ...fallback: [] | [unknown]): unknown;
  prop(name: string, ...fallback: [] | [unknown]): unknown {
    const lookup = this.lookup(name);
    if (lookup.found) return lookup.value;
    if (fallback.length === 1) return fallback[0];
    throw this.missing(name);
  }

  /** Whether `name` resolves to a value (supplied or default). */
  hasProp(name: string): boolean {
    return this.lookup(name).found;
  }

  /**
   * Every prop that resolves to a value: supplied props in the order they
   * were given, then defaults of the remaining declared props.
   */
  get props(): Readonly<AnyProps> {
    if (!this.merged) {
      const merged: AnyProps = { ...this.supplied };
      for (const name of this.type.propTypes.names) {
        if (Object.hasOwn(merged, name)) continue;
        const lookup = this.lookup(name);
        if (lookup.found) setOwn(merged, name, lookup.value);
      }
      this.merged = Object.freeze(merged);
    }
    return this.merged;
  }

  private lookup(name: string): PropLookup {
    if (Object.hasOwn(this.supplied, name)) {
      return { found: true, value: this.supplied[name] };
    }

    const spec = this.type.propTypes.get(name);
    if (!spec) return NOT_FOUND;

    if (spec.factory) {
      if (!this.factoryDefaults.has(name)) {
        this.factoryDefaults.set(name, spec.factory());
      }
      const value = this.factoryDefaults.get(name);
      return value === undefined ? NOT_FOUND : { found: true, value };
    }

    if (spec.hasDefault && spec.default !== undefined) {
      return { found: true, value: spec.default };
    }
    return NOT_FOUND;
  }

  private missing(name: string): PropError {
    const spec = this.type.propTypes.get(name);
    if (spec?.required) return new RequiredPropError(this.tagName, name);
    if (!spec && !isPassthroughPropName(name) && !acceptsAnyProp(this.type)) {
      return new InvalidPropNameError(this.tagName, name);
    }
    return new UnsetPropError(this.tagName, name);
  }
}

/** Names passed as-is (`data-*`, `aria-*`) plus the declared ones. */
type PassthroughProps = {
  readonly [name: `data-${string}` | `aria-${string}`]: unknown;
};

/**
 * Props accepted by {@link createElement} for props shape `P`.
 *
 * Required props are not enforced here: a missing required prop is an
 * error only when it is read.
 */
export type PropsInput<P extends AnyProps> = {
  readonly [K in keyof P]?: P[K] | NotProvided;
} & { readonly ref?: Ref<unknown> | NotProvided } & PassthroughProps;

export type ElementTypeInput = string | ElementType | FunctionComponent;

/**
 * Instantiates an element.
 *
 * Pipeline overview:
 * 1. Resolve the type: strings are HTML tag names, plain functions are
 *    function components, element types are used as they are.
 * 2. Split off `ref`.
 * 3. Validate the props once, against the configuration active now.
 * 4. Check the children.
 *
 * @throws {ElementError} Unknown tag names, invalid props or children.
 */
export function createElement<P extends AnyProps>(
  type: ComponentType<P> | ContextType<P>,
  props?: NoInfer<PropsInput<P>> | null,
  ...children: Child[]
): ElementInstance<P>;
export function createElement(
  type: ElementTypeInput,
  props?: PropsInput<AnyProps> | null,
  ...children: Child[]
): ElementInstance;
export function createElement(
  type: ElementTypeInput,
  props?: PropsInput<AnyProps> | null,
  ...children: Child[]
): ElementInstance {
  // 1. Resolve
  const resolved = resolveType(type);

  // 2. Ref
  const input: PropsInput<AnyProps> = props ?? {};
  const { ref, ...rest } = input;
  const boundRef = readRef(resolved, ref);

  // 3. Props
  const supplied = acceptsAnyProp(resolved)
    ? dropUnsupplied(rest)
    : validateProps(resolved.propTypes, resolved.name, rest, getConfig());

  // 4. Children
  for (const child of children) {
    assertChild(resolved, child);
  }

  return new ElementInstance(resolved, supplied, children, boundRef);
}

/** Pre-rendered HTML, inserted without escaping. */
export function raw(text: string): ElementInstance {
  return createElement(RawHtml, { text });
}

/**
 * Element factory targeted by the transpiler: `h(type, props, ...children)`,
 * with `h.Fragment` for `<>...</>` and `h.NotProvided` for the
 * `notprovided` attribute literal.
 */
export const h = Object.assign(createElement, { Fragment, NotProvided, raw });

const functionTypes = new WeakMap<FunctionComponent, FunctionComponentType>();
const OPEN_PROPS = new PropTypesTable('Function', new Map());

const ELEMENT_KINDS: ReadonlySet<string> = new Set([
  'html',
  'component',
  'function',
  'fragment',
  'raw',
  'context',
  'collector',
  'collect'
]);

export function isElementType(value: unknown): value is ElementType {
  return (
    isRecord(value) &&
    isString(value.kind) &&
    ELEMENT_KINDS.has(value.kind) &&
    value.propTypes instanceof PropTypesTable
  );
}

function resolveType(type: ElementTypeInput): ElementType {
  if (typeof type === 'string') return resolveHtmlTag(type);
  if (typeof type === 'function') return functionType(type);
  if (isElementType(type)) return type;
  throw new TagweaveError(
    `[tagweave] ${describeValue(type)} is not an element type`
  );
}

function functionType(fn: FunctionComponent): FunctionComponentType {
  const cached = functionTypes.get(fn);
  if (cached) return cached;

  const created: FunctionComponentType = {
    kind: 'function',
    name: fn.name || 'Anonymous',
    fn,
    acceptsChildren: true,
    propTypes: OPEN_PROPS
  };
  functionTypes.set(fn, Object.freeze(created));
  return created;
}

/** Function components and custom elements declare no props of their own. */
function acceptsAnyProp(type: ElementType): boolean {
  return type.kind === 'function' || (type.kind === 'html' && type.open);
}

function dropUnsupplied(input: Readonly<AnyProps>): AnyProps {
  const props: AnyProps = {};
  for (const [name, value] of Object.entries(input)) {
    if (isSupplied(value)) setOwn(props, name, value);
  }
  return props;
}

function readRef(type: ElementType, value: unknown): Ref | undefined {
  if (!isSupplied(value)) return undefined;
  if (value instanceof Ref) return value;
  throw new InvalidPropValueError(type.name, 'ref', value, 'Ref');
}

function assertChild(type: ElementType, child: unknown): void {
  if (isEmptyChild(child)) return;

  if (isArray(child)) {
    for (const item of child) assertChild(type, item);
    return;
  }

  if (typeof child === 'function') {
    throw new InvalidChildrenError(
      type.name,
      `${describeValue(child)} is not a valid child; wrap lazy content in deferred()`
    );
  }

  const renderable =
    typeof child === 'string' ||
    typeof child === 'number' ||
    typeof child === 'bigint' ||
    isElementInstance(child) ||
    isDeferred(child);
  if (!renderable) {
    throw new InvalidChildrenError(type.name, `${describeValue(child)} is not a valid child`);
  }

  if (!type.acceptsChildren) {
    throw new InvalidChildrenError(type.name, 'does not accept children');
  }
}
