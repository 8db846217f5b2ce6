export { types, isNode } from './builtins';
export {
  createPropType,
  failure,
  isStandardSchema,
  success,
  typeNameOf,
  validateWithSchema,
  type Check,
  type PropType,
  type PropTypeLike,
  type SchemaOutcome
} from './schema';
export {
  choices,
  defaultChoices,
  isPropSpec,
  prop,
  required,
  type ChoicesOptions,
  type PropKind,
  type PropOptions,
  type PropSpec
} from './spec';
export {
  definePropTypes,
  PropTypesTable,
  type AnyProps,
  type DefinePropTypesOptions
} from './table';
export { isPassthroughPropName, normalizeBoolean, validateProps } from './validate';
export type {
  InferPropValue,
  InferProps,
  MergeProps,
  PropDeclaration,
  PropDeclarations,
  Simplify
} from './inference';
