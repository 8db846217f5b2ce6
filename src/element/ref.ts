import { RefError } from '../errors';
import { Unset } from '../sentinels';

/**
 * One-shot, single-slot binding.
 *
 * Contract:
 * - Bound exactly once, when the element carrying it (`ref={...}`) has
 *   finished rendering its whole subtree.
 * - Before that, {@link Ref.current} is {@link Unset}.
 * - Binding twice raises {@link RefError}; a ref belongs to one render.
 */
export class Ref<T = unknown> {
  private value: T | Unset = Unset;

  get current(): T | Unset {
    return this.value;
  }

  get isSet(): boolean {
    return this.value !== Unset;
  }

  /**
   * @throws {RefError} When the ref is not bound yet.
   */
  get(): T {
    const { value } = this;
    if (value === Unset) {
      throw new RefError('[tagweave] Ref read before the element it is bound to was rendered');
    }
    return value;
  }

  /** @internal Called by the renderer. */
  set(value: T): void {
    if (this.value !== Unset) {
      throw new RefError('[tagweave] Ref is already bound; a ref can be bound only once');
    }
    this.value = value;
  }
}

export function createRef<T = unknown>(): Ref<T> {
  return new Ref<T>();
}
