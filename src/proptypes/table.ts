import { SchemaDefinitionError, describeValue } from '../errors';
import { isArray } from '../utils/type-guards';
import type { MergeProps, PropDeclaration, PropDeclarations } from './inference';
import {
  isBooleanType,
  isStandardSchema,
  typeNameOf,
  validateWithSchema
} from './schema';
import { isPropSpec, prop, type PropSpec } from './spec';

/** Loosely typed props bag, the erased form of every props type. */
export type AnyProps = Record<string, unknown>;

/**
 * Ordered, frozen prop declarations of one element type.
 *
 * `Props` is type-level only: it records the props shape the declarations
 * describe so that `element.prop('name')` can be typed.
 */
export class PropTypesTable<Props extends object = AnyProps> {
  declare readonly propsType: Props;

  readonly owner: string;
  private readonly specs: ReadonlyMap<string, PropSpec>;

  constructor(owner: string, specs: ReadonlyMap<string, PropSpec>) {
    this.owner = owner;
    this.specs = specs;
    Object.freeze(this);
  }

  /** Declared names, in declaration order. */
  get names(): string[] {
    return [...this.specs.keys()];
  }

  get size(): number {
    return this.specs.size;
  }

  has(name: string): boolean {
    return this.specs.has(name);
  }

  get(name: string): PropSpec | undefined {
    return this.specs.get(name);
  }

  entries(): IterableIterator<[string, PropSpec]> {
    return this.specs.entries();
  }

  isBoolean(name: string): boolean {
    const spec = this.specs.get(name);
    return spec !== undefined && isBooleanType(spec.type);
  }
}

export interface DefinePropTypesOptions<
  Parent extends object,
  Excluded extends string
> {
  /** Table to start from: its order is kept, same-name entries are replaced in place. */
  extends?: PropTypesTable<Parent>;
  /** Names removed from the merged table. */
  exclude?: readonly Excluded[];
}

/**
 * Builds a prop types table.
 *
 * Merge rules (explicit composition, no class inheritance):
 * 1. Start from the parent's entries, in the parent's order.
 * 2. A declaration with an existing name replaces that entry in place.
 * 3. New names are appended in declaration order.
 * 4. Excluded names are removed.
 *
 * Definition-time checks (raise {@link SchemaDefinitionError}):
 * - a required prop with a default or a default factory
 * - a required `defaultChoices` prop
 * - a choice list that is not a non-empty array
 * - a default (or the factory's first result) failing its own type
 * - a default outside its choice list
 *
 * @example
 * ```ts
 * const ButtonProps = definePropTypes('Button', {
 *   label: required(types.string),
 *   size: defaultChoices(['md', 'sm', 'lg']),
 *   disabled: types.boolean
 * });
 * ```
 */
export function definePropTypes<
  D extends PropDeclarations,
  Parent extends object = {},
  Excluded extends string = never
>(
  owner: string,
  declarations: D,
  options: DefinePropTypesOptions<Parent, Excluded> = {}
): PropTypesTable<MergeProps<Parent, D, Excluded>> {
  const merged = new Map<string, PropSpec>(options.extends?.entries() ?? []);

  for (const [name, declaration] of Object.entries(declarations)) {
    const spec = toSpec(owner, name, declaration);
    assertValidSpec(owner, name, spec);
    merged.set(name, spec);
  }

  for (const name of options.exclude ?? []) {
    merged.delete(name);
  }

  return new PropTypesTable<MergeProps<Parent, D, Excluded>>(owner, merged);
}

function toSpec(owner: string, name: string, declaration: PropDeclaration): PropSpec {
  if (isPropSpec(declaration)) return declaration;
  if (isStandardSchema(declaration)) return prop(declaration);
  throw new SchemaDefinitionError(
    owner,
    name,
    `expected a prop type or prop spec, received ${describeValue(declaration)}`
  );
}

function assertValidSpec(owner: string, name: string, spec: PropSpec): void {
  const fail = (reason: string) => new SchemaDefinitionError(owner, name, reason);

  if (spec.kind !== 'plain') {
    if (!isArray(spec.choices) || spec.choices.length === 0) {
      throw fail('choices must be a non-empty list');
    }
  }

  if (spec.kind === 'default-choices' && spec.required) {
    throw fail('a defaultChoices prop cannot be required');
  }

  if (spec.required && (spec.hasDefault || spec.factory)) {
    throw fail('a required prop cannot have a default value');
  }

  const defaults: unknown[] = [];
  if (spec.hasDefault) defaults.push(spec.default);
  if (spec.factory) defaults.push(spec.factory());

  for (const value of defaults) {
    // An `undefined` default leaves the prop unset.
    if (value === undefined) continue;

    const outcome = validateWithSchema(spec.type, value, `<${owner}>.${name}`);
    if (!outcome.ok) {
      throw fail(
        `default value ${describeValue(value)} is not a valid ${typeNameOf(spec.type)} (${outcome.message})`
      );
    }
    if (spec.choices && !spec.choices.some(choice => Object.is(choice, value))) {
      throw fail(`default value ${describeValue(value)} is not one of the choices`);
    }
  }
}
