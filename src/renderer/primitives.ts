import type { ContextScope } from '../element/context';
import type { Deferred } from '../element/deferred';
import type { CollectedRenderOptions, CollectorScope } from './collector-scope';

/**
 * Output of the render pass: a tree of HTML-level nodes, with two lazy
 * leaves resolved only by the serializer.
 */
export type Primitive =
  | TextPrimitive
  | RawPrimitive
  | TagPrimitive
  | DeferredPrimitive
  | CollectedPrimitive;

/** Text, escaped on output. */
export interface TextPrimitive {
  readonly kind: 'text';
  readonly text: string;
}

/** HTML written as is. */
export interface RawPrimitive {
  readonly kind: 'raw';
  readonly html: string;
}

export interface TagPrimitive {
  readonly kind: 'tag';
  readonly tag: string;
  /** `true` renders a bare attribute (`<input disabled>`). */
  readonly attributes: ReadonlyArray<readonly [string, string | true]>;
  readonly isVoid: boolean;
  readonly children: readonly Primitive[];
}

/** A deferred leaf, with the context scope it appeared in. */
export interface DeferredPrimitive {
  readonly kind: 'deferred';
  readonly deferred: Deferred;
  readonly context: ContextScope;
}

/** Where a collector injects its aggregate. */
export interface CollectedPrimitive {
  readonly kind: 'collected';
  readonly collector: CollectorScope;
  readonly options: CollectedRenderOptions;
}
