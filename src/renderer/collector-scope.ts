import { raw, type ElementInstance } from '../element/element';
import type { CollectorType, ComponentType } from '../element/types';
import type { Primitive, TagPrimitive } from './primitives';
import { serialize, type DeferredExpander } from './serialize';

export interface CollectedRenderOptions {
  /** Namespaces to include, in this order. Defaults to all, first-seen order. */
  namespaces?: readonly string[];
  /** Wrap the content in the collector's tag. Defaults to `true`. */
  withTag?: boolean;
}

/**
 * What a ref bound on a collector receives: the collected content, ready to
 * be placed anywhere in the tree (typically from a deferred leaf).
 */
export interface CollectedContent {
  /** The aggregate as a raw element. */
  render(options?: CollectedRenderOptions): ElementInstance;
  /** The aggregate as HTML. */
  toHtml(options?: CollectedRenderOptions): string;
}

/** Content groups of one namespace, concatenated in this order. */
export type CollectedBucket = 'markers' | 'globals' | 'instances';

type NamespaceContent = Record<CollectedBucket, Primitive[]>;

/**
 * State of one rendered collector.
 *
 * Contract:
 * - Content is grouped by namespace; within a namespace, marker content
 *   comes first, then global hook output, then instance hook output, each
 *   in render order.
 * - A definition's global hook contributes at most once per scope
 *   ({@link CollectorScope.claimGlobal}).
 * - The aggregate is wrapped in the collector's tag even when empty.
 */
export class CollectorScope implements CollectedContent {
  readonly type: CollectorType;

  private readonly typeAttribute: string | undefined;
  private readonly expander: DeferredExpander;
  private readonly content = new Map<string, NamespaceContent>();
  private readonly claimed = new Set<ComponentType>();

  constructor(
    type: CollectorType,
    typeAttribute: string | undefined,
    expander: DeferredExpander
  ) {
    this.type = type;
    this.typeAttribute = typeAttribute;
    this.expander = expander;
  }

  add(bucket: CollectedBucket, namespace: string, primitives: readonly Primitive[]): void {
    let entry = this.content.get(namespace);
    if (!entry) {
      entry = { markers: [], globals: [], instances: [] };
      this.content.set(namespace, entry);
    }
    entry[bucket].push(...primitives);
  }

  /** `true` the first time `owner` asks, `false` afterwards. */
  claimGlobal(owner: ComponentType): boolean {
    if (this.claimed.has(owner)) return false;
    this.claimed.add(owner);
    return true;
  }

  /** The aggregate as primitives. */
  collect(options: CollectedRenderOptions = {}): Primitive[] {
    const names = options.namespaces ?? [...this.content.keys()];
    const collected: Primitive[] = [];

    for (const name of names) {
      const entry = this.content.get(name);
      if (!entry) continue;
      collected.push(...entry.markers, ...entry.globals, ...entry.instances);
    }

    const { wrapTag } = this.type;
    if (!(options.withTag ?? true) || wrapTag === null) return collected;

    const wrapped: TagPrimitive = {
      kind: 'tag',
      tag: wrapTag,
      attributes: this.typeAttribute === undefined ? [] : [['type', this.typeAttribute]],
      isVoid: false,
      children: collected
    };
    return [wrapped];
  }

  render(options?: CollectedRenderOptions): ElementInstance {
    return raw(this.toHtml(options));
  }

  toHtml(options?: CollectedRenderOptions): string {
    return serialize(this.collect(options), this.expander);
  }
}
