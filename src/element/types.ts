import type { AnyProps, PropTypesTable } from '../proptypes/table';
import type { ElementInstance } from './element';
import type { Child } from './node';

/**
 * Read access to the context scopes active where an element renders.
 *
 * Lookup walks from the innermost scope outwards; the nearest scope that
 * provides a name wins.
 */
export interface ContextReader {
  /** @throws {UnsetPropError} When no active scope provides `name`. */
  get(name: string): unknown;
  has(name: string): boolean;
  getOr<T>(name: string, fallback: T): unknown;
}

/**
 * What a js/css hook may return: content for the default namespace, or a
 * plain object mapping namespaces to content. Strings are collected as is
 * (no escaping); elements are rendered where the hook ran.
 */
export type CollectedOutput = Child | Readonly<Record<string, Child>>;

export type CollectorKind = 'js' | 'css';

/**
 * Capability set of a component: `render` plus optional side-channel hooks.
 *
 * Declared with method syntax so that a component typed for specific props
 * is still usable where any component is expected.
 */
export interface ComponentHooks<P extends AnyProps> {
  render?(element: ElementInstance<P>, context: ContextReader): Child;
  /** Collected once per rendered instance by the nearest JS collector. */
  renderJs?(element: ElementInstance<P>, context: ContextReader): CollectedOutput;
  /** Collected once per rendered instance by the nearest CSS collector. */
  renderCss?(element: ElementInstance<P>, context: ContextReader): CollectedOutput;
  /** Collected at most once per collector scope for this definition. */
  renderJsGlobal?(context: ContextReader): CollectedOutput;
  /** Collected at most once per collector scope for this definition. */
  renderCssGlobal?(context: ContextReader): CollectedOutput;
}

interface ElementTypeBase<P extends object> {
  /** Display name, used in messages (`<Name>.prop: ...`). */
  readonly name: string;
  readonly propTypes: PropTypesTable<P>;
  /** When `false`, instantiating with children raises `InvalidChildrenError`. */
  readonly acceptsChildren: boolean;
}

export interface HtmlElementType extends ElementTypeBase<AnyProps> {
  readonly kind: 'html';
  readonly tag: string;
  /** Void tags (`<br />`) never have children or a closing tag. */
  readonly isVoid: boolean;
  /** Custom elements (`my-widget`) accept any attribute. */
  readonly open: boolean;
}

export interface ComponentType<P extends AnyProps = AnyProps>
  extends ElementTypeBase<P> {
  readonly kind: 'component';
  /** Component this one derives from, root-most last. */
  readonly parent: ComponentType | undefined;
  /** Hooks declared by this definition only (not inherited). */
  readonly hooks: Readonly<ComponentHooks<P>>;
}

export type FunctionComponent = (
  props: Readonly<AnyProps> & { readonly children: readonly Child[] },
  context: ContextReader
) => Child;

export interface FunctionComponentType extends ElementTypeBase<AnyProps> {
  readonly kind: 'function';
  readonly fn: FunctionComponent;
}

export interface FragmentType extends ElementTypeBase<AnyProps> {
  readonly kind: 'fragment';
}

export interface RawType extends ElementTypeBase<AnyProps> {
  readonly kind: 'raw';
}

export interface ContextType<P extends object = AnyProps>
  extends ElementTypeBase<P> {
  readonly kind: 'context';
}

export interface CollectorType extends ElementTypeBase<AnyProps> {
  readonly kind: 'collector';
  /** Hooks of this kind fold into the collector; `null` gathers markers only. */
  readonly collectorKind: CollectorKind | null;
  /** Tag wrapping the aggregate (`script`, `style`), or `null` for none. */
  readonly wrapTag: string | null;
  /** Marker element whose children are collected by this collector type. */
  readonly Collect: CollectMarkerType;
}

export interface CollectMarkerType extends ElementTypeBase<AnyProps> {
  readonly kind: 'collect';
  /** Name of the collector type owning this marker. */
  readonly collectorName: string;
}

export type ElementType =
  | HtmlElementType
  | ComponentType
  | FunctionComponentType
  | FragmentType
  | RawType
  | ContextType
  | CollectorType
  | CollectMarkerType;
