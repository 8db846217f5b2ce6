import { UnsetPropError } from '../errors';
import type { AnyProps, PropTypesTable } from '../proptypes/table';
import type { ElementInstance } from './element';
import type { ContextReader, ContextType } from './types';

export interface ContextDefinition<P extends AnyProps> {
  name: string;
  /** Values the context provides; read them with `context.get(name)`. */
  propTypes: PropTypesTable<P>;
}

/**
 * Defines a context provider.
 *
 * Rendering `<Theme color="dark">...</Theme>` makes `color` readable by
 * every descendant through the context reader passed to render hooks.
 * Nested providers shadow outer ones name by name.
 */
export function defineContext<P extends AnyProps>(
  definition: ContextDefinition<P>
): ContextType<P> {
  const context: ContextType<P> = {
    kind: 'context',
    name: definition.name,
    acceptsChildren: true,
    propTypes: definition.propTypes
  };
  return Object.freeze(context);
}

/** Values one provider instance contributes. */
export interface ContextFrame {
  readonly owner: string;
  readonly values: ReadonlyMap<string, unknown>;
}

/** Declared props of a provider instance that resolve to a value. */
export function contextFrame(element: ElementInstance): ContextFrame {
  const values = new Map<string, unknown>();
  for (const name of element.type.propTypes.names) {
    if (element.hasProp(name)) values.set(name, element.prop(name));
  }
  return { owner: element.tagName, values };
}

/**
 * Immutable stack of provider frames.
 *
 * Entering a provider yields a new scope, so a scope captured by a deferred
 * leaf keeps seeing exactly the providers that enclosed it.
 */
export class ContextScope implements ContextReader {
  static readonly EMPTY = new ContextScope([]);

  private readonly frames: readonly ContextFrame[];

  private constructor(frames: readonly ContextFrame[]) {
    this.frames = frames;
  }

  push(frame: ContextFrame): ContextScope {
    return new ContextScope([...this.frames, frame]);
  }

  get(name: string): unknown {
    const frame = this.find(name);
    if (!frame) throw new UnsetPropError('context', name);
    return frame.values.get(name);
  }

  has(name: string): boolean {
    return this.find(name) !== undefined;
  }

  getOr<T>(name: string, fallback: T): unknown {
    const frame = this.find(name);
    return frame ? frame.values.get(name) : fallback;
  }

  private find(name: string): ContextFrame | undefined {
    for (let index = this.frames.length - 1; index >= 0; index--) {
      const frame = this.frames[index];
      if (frame?.values.has(name)) return frame;
    }
    return undefined;
  }
}
