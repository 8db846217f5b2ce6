import { DEFAULT_NAMESPACE } from '../element/collector';
import {
  globalHooks,
  resolveInstanceHook,
  resolveRender
} from '../element/component';
import { ContextScope, contextFrame } from '../element/context';
import { isDeferred } from '../element/deferred';
import type { ElementInstance } from '../element/element';
import { isElementInstance, isEmptyChild, type Child } from '../element/node';
import type {
  CollectMarkerType,
  CollectorKind,
  CollectorType,
  ComponentType,
  HtmlElementType
} from '../element/types';
import { InvalidChildrenError, describeValue } from '../errors';
import { isArray, isPlainObject, isString } from '../utils/type-guards';
import { CollectorScope, type CollectedBucket } from './collector-scope';
import type { CollectedPrimitive, DeferredPrimitive, Primitive, TagPrimitive } from './primitives';
import type { DeferredExpander } from './serialize';

const COLLECTOR_KINDS: readonly CollectorKind[] = ['js', 'css'];

/**
 * Expands an element tree into primitives.
 *
 * Pipeline overview (per element, depth first):
 * 1. Components render; their js/css hooks run right after, with the same
 *    context, and feed the nearest collector of the matching kind.
 * 2. Context providers push a scope for their subtree.
 * 3. Collectors open a collection scope for their subtree and leave a
 *    placeholder where the aggregate goes.
 * 4. `Collect` markers hand their children to the nearest collector of
 *    their type and render nothing in place.
 * 5. Deferred leaves are kept, with the current context, for the
 *    serializer.
 * 6. Once the element's subtree is expanded, its ref is bound.
 */
export class RenderPass implements DeferredExpander {
  private context: ContextScope;
  private readonly collectors: CollectorScope[] = [];

  constructor(context: ContextScope = ContextScope.EMPTY) {
    this.context = context;
  }

  render(child: Child): Primitive[] {
    const out: Primitive[] = [];
    this.expand(child, out, 'root');
    return out;
  }

  /**
   * Deferred content renders in a fresh pass under the captured context;
   * there is no enclosing collector at that point.
   */
  expandDeferred(node: DeferredPrimitive): Primitive[] {
    return new RenderPass(node.context).render(node.deferred.produce());
  }

  private expand(child: unknown, out: Primitive[], parent: string): void {
    if (isEmptyChild(child)) return;

    if (isString(child)) {
      out.push({ kind: 'text', text: child });
      return;
    }
    if (typeof child === 'number' || typeof child === 'bigint') {
      out.push({ kind: 'text', text: String(child) });
      return;
    }
    if (isArray(child)) {
      for (const item of child) this.expand(item, out, parent);
      return;
    }
    if (isDeferred(child)) {
      out.push({ kind: 'deferred', deferred: child, context: this.context });
      return;
    }
    if (isElementInstance(child)) {
      this.expandElement(child, out);
      return;
    }

    throw new InvalidChildrenError(parent, `${describeValue(child)} is not a valid child`);
  }

  private expandElement(element: ElementInstance, out: Primitive[]): void {
    const { type } = element;
    let bound: unknown = element;

    switch (type.kind) {
      case 'html':
        out.push(this.tag(element, type));
        break;
      case 'fragment':
        this.expand(element.children, out, type.name);
        break;
      case 'raw':
        out.push({ kind: 'raw', html: String(element.prop('text')) });
        break;
      case 'function':
        this.expand(
          type.fn({ ...element.props, children: element.children }, this.context),
          out,
          type.name
        );
        break;
      case 'component':
        this.component(element, type, out);
        break;
      case 'context':
        this.provide(element, out);
        break;
      case 'collector':
        bound = this.collector(element, type, out);
        break;
      case 'collect':
        this.marker(element, type);
        break;
    }

    element.ref?.set(bound);
  }

  private tag(element: ElementInstance, type: HtmlElementType): TagPrimitive {
    const attributes: Array<readonly [string, string | true]> = [];
    for (const [name, value] of Object.entries(element.props)) {
      if (value === null || value === undefined) continue;
      if (type.propTypes.isBoolean(name)) {
        if (value) attributes.push([name, true]);
        continue;
      }
      attributes.push([name, String(value)]);
    }

    const children: Primitive[] = [];
    this.expand(element.children, children, type.name);
    return { kind: 'tag', tag: type.tag, attributes, isVoid: type.isVoid, children };
  }

  private component(element: ElementInstance, type: ComponentType, out: Primitive[]): void {
    const render = resolveRender(type);
    const result = render ? render(element, this.context) : element.children;
    this.collectHooks(element, type);
    this.expand(result, out, type.name);
  }

  private collectHooks(element: ElementInstance, type: ComponentType): void {
    for (const kind of COLLECTOR_KINDS) {
      const target = this.nearestCollector(scope => scope.type.collectorKind === kind);
      if (!target) continue;

      for (const { owner, hook } of globalHooks(type, kind)) {
        if (target.claimGlobal(owner)) {
          this.gather(target, 'globals', hook(this.context));
        }
      }

      const hook = resolveInstanceHook(type, kind);
      if (hook) this.gather(target, 'instances', hook(element, this.context));
    }
  }

  private provide(element: ElementInstance, out: Primitive[]): void {
    const outer = this.context;
    this.context = outer.push(contextFrame(element));
    try {
      this.expand(element.children, out, element.tagName);
    } finally {
      this.context = outer;
    }
  }

  private collector(
    element: ElementInstance,
    type: CollectorType,
    out: Primitive[]
  ): CollectorScope {
    const typeAttribute = element.prop('type', undefined);
    const scope = new CollectorScope(
      type,
      isString(typeAttribute) ? typeAttribute : undefined,
      this
    );

    const inner: Primitive[] = [];
    this.collectors.push(scope);
    try {
      this.expand(element.children, inner, type.name);
    } finally {
      this.collectors.pop();
    }

    const placeholder: CollectedPrimitive = { kind: 'collected', collector: scope, options: {} };
    const position = element.prop('renderPosition', null);
    if (position === 'before') out.push(placeholder);
    out.push(...inner);
    if (position === 'after') out.push(placeholder);

    return scope;
  }

  private marker(element: ElementInstance, type: CollectMarkerType): void {
    const target = this.nearestCollector(scope => scope.type.Collect === type);
    if (!target) return;

    const namespace = element.prop('namespace', DEFAULT_NAMESPACE);
    this.gather(target, 'markers', { [String(namespace)]: element.children });
  }

  private nearestCollector(
    match: (scope: CollectorScope) => boolean
  ): CollectorScope | undefined {
    for (let index = this.collectors.length - 1; index >= 0; index--) {
      const scope = this.collectors[index];
      if (scope && match(scope)) return scope;
    }
    return undefined;
  }

  /**
   * Adds hook or marker output to a collector. A plain object maps
   * namespaces to content; anything else goes to the default namespace.
   * Top-level strings are collected as raw text.
   */
  private gather(target: CollectorScope, bucket: CollectedBucket, output: unknown): void {
    const byNamespace = isPlainObject(output) ? output : { [DEFAULT_NAMESPACE]: output };

    for (const [namespace, content] of Object.entries(byNamespace)) {
      const primitives: Primitive[] = [];
      for (const item of isArray(content) ? content : [content]) {
        if (isString(item)) {
          primitives.push({ kind: 'raw', html: item });
        } else {
          this.expand(item, primitives, target.type.name);
        }
      }
      target.add(bucket, namespace, primitives);
    }
  }
}
