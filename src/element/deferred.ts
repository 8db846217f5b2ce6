import type { Child } from './node';

/**
 * A leaf whose content is produced only when the tree is serialized.
 *
 * Rendering finishes (and binds every {@link Ref}) before serialization
 * starts, so a producer may read refs that were unset while the tree was
 * being rendered.
 */
export class Deferred {
  readonly produce: () => Child;

  constructor(produce: () => Child) {
    this.produce = produce;
  }
}

/**
 * @example
 * ```ts
 * const title = createRef<ElementInstance>();
 * <Fragment>
 *   <h1>{deferred(() => title.get().prop('text'))}</h1>
 *   <Title ref={title} text="Chapter 1" />
 * </Fragment>
 * ```
 */
export function deferred(produce: () => Child): Deferred {
  return new Deferred(produce);
}

export function isDeferred(value: unknown): value is Deferred {
  return value instanceof Deferred;
}
