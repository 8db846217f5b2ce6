import type { Simplify } from '../proptypes/inference';
import { PropTypesTable, type AnyProps } from '../proptypes/table';
import { BaseElementProps } from './intrinsic';
import type { CollectorKind, ComponentHooks, ComponentType } from './types';

/** Props of a component: its own declarations over `id` and `class`. */
export type WithBaseProps<P extends AnyProps> = Simplify<
  Omit<BaseElementProps, keyof P> & P
>;

export interface ComponentDefinition<P extends AnyProps>
  extends ComponentHooks<WithBaseProps<P>> {
  name: string;
  /**
   * Declared props. Defaults to the parent's table when `extends` is set,
   * otherwise to no props beyond `id` and `class`.
   */
  propTypes?: PropTypesTable<P>;
  /** Component whose hooks are inherited when not redeclared. */
  extends?: ComponentType;
  /** Names removed from the resulting table (including `id` and `class`). */
  exclude?: readonly string[];
  /** Defaults to `true`. */
  acceptsChildren?: boolean;
}

/**
 * Defines a component.
 *
 * Contract:
 * - `render` and the per-instance hooks (`renderJs`, `renderCss`) are
 *   inherited from `extends` unless redeclared.
 * - Global hooks (`renderJsGlobal`, `renderCssGlobal`) belong to the
 *   definition that declares them: each definition in the chain contributes
 *   its own, once per collector scope.
 * - Without any `render` in the chain, the component renders its children.
 *
 * @example
 * ```ts
 * const Greeting = defineElement({
 *   name: 'Greeting',
 *   propTypes: definePropTypes('Greeting', { name: required(types.string) }),
 *   render: element => h('div', null, 'Hello, ', element.prop('name'))
 * });
 * ```
 */
export function defineElement<P extends AnyProps = {}>(
  definition: ComponentDefinition<P>
): ComponentType<WithBaseProps<P>> {
  const parent = definition.extends;
  const own = definition.propTypes ?? parent?.propTypes;

  const specs = new Map(BaseElementProps.entries());
  for (const [name, spec] of own?.entries() ?? []) {
    specs.set(name, spec);
  }
  for (const name of definition.exclude ?? []) {
    specs.delete(name);
  }

  const component: ComponentType<WithBaseProps<P>> = {
    kind: 'component',
    name: definition.name,
    parent,
    hooks: definition,
    acceptsChildren: definition.acceptsChildren ?? parent?.acceptsChildren ?? true,
    propTypes: new PropTypesTable<WithBaseProps<P>>(definition.name, specs)
  };
  return Object.freeze(component);
}

/** Definition chain of a component, root-most first. */
export function lineage(type: ComponentType): ComponentType[] {
  const chain: ComponentType[] = [];
  for (let current: ComponentType | undefined = type; current; current = current.parent) {
    chain.unshift(current);
  }
  return chain;
}

/**
 * The nearest `render` in the chain, if any.
 *
 * Hooks are invoked through their definition object so that methods keep
 * their receiver.
 */
export function resolveRender(
  type: ComponentType
): ComponentHooks<AnyProps>['render'] {
  for (let current: ComponentType | undefined = type; current; current = current.parent) {
    const { hooks } = current;
    if (hooks.render) return (element, context) => hooks.render?.(element, context);
  }
  return undefined;
}

type InstanceHook = NonNullable<ComponentHooks<AnyProps>['renderJs']>;
type GlobalHook = NonNullable<ComponentHooks<AnyProps>['renderJsGlobal']>;

/** The nearest per-instance hook of `kind` in the chain, if any. */
export function resolveInstanceHook(
  type: ComponentType,
  kind: CollectorKind
): InstanceHook | undefined {
  for (let current: ComponentType | undefined = type; current; current = current.parent) {
    const { hooks } = current;
    if (kind === 'js' && hooks.renderJs) {
      return (element, context) => hooks.renderJs?.(element, context);
    }
    if (kind === 'css' && hooks.renderCss) {
      return (element, context) => hooks.renderCss?.(element, context);
    }
  }
  return undefined;
}

/**
 * Global hooks of `kind` declared along the chain, root-most first, each
 * paired with the definition that owns it.
 */
export function globalHooks(
  type: ComponentType,
  kind: CollectorKind
): Array<{ owner: ComponentType; hook: GlobalHook }> {
  const found: Array<{ owner: ComponentType; hook: GlobalHook }> = [];
  for (const owner of lineage(type)) {
    const { hooks } = owner;
    if (kind === 'js' && hooks.renderJsGlobal) {
      found.push({ owner, hook: context => hooks.renderJsGlobal?.(context) });
    }
    if (kind === 'css' && hooks.renderCssGlobal) {
      found.push({ owner, hook: context => hooks.renderCssGlobal?.(context) });
    }
  }
  return found;
}
