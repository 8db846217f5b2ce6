import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { PropSpec } from './spec';

/**
 * Internal DX Helper:
 * Flattens intersections (A & B) into a single object type so hover
 * previews of inferred props stay readable.
 *
 * @see https://github.com/sindresorhus/type-fest/blob/main/source/simplify.d.ts
 */
export type Simplify<T> = { [KeyType in keyof T]: T[KeyType] } & {};

/** One entry of a declaration map: a spec, or a bare type (optional prop). */
export type PropDeclaration = PropSpec<unknown> | StandardSchemaV1<unknown, unknown>;

export type PropDeclarations = Readonly<Record<string, PropDeclaration>>;

/**
 * Value type of one declaration.
 *
 * Logic:
 * 1. Spec          -> its type argument.
 * 2. Bare schema   -> the schema's output type.
 */
export type InferPropValue<D> =
  D extends PropSpec<infer T>
    ? T
    : D extends StandardSchemaV1<unknown, infer Output>
      ? Output
      : unknown;

/** Props object described by a declaration map. */
export type InferProps<D extends PropDeclarations> = Simplify<{
  -readonly [K in keyof D & string]: InferPropValue<D[K]>;
}>;

/**
 * Props of a table derived from `Parent`: parent entries minus overridden
 * and excluded names, plus the new declarations.
 */
export type MergeProps<
  Parent extends object,
  D extends PropDeclarations,
  Excluded extends string
> = Simplify<Omit<Parent, keyof D | Excluded> & InferProps<D>>;
