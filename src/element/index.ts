export { CSSCollector, DEFAULT_NAMESPACE, JSCollector, defineCollector } from './collector';
export type { CollectorDefinition } from './collector';
export { defineElement } from './component';
export type { ComponentDefinition, WithBaseProps } from './component';
export { ContextScope, defineContext } from './context';
export type { ContextDefinition } from './context';
export { Deferred, deferred, isDeferred } from './deferred';
export {
  ElementInstance,
  createElement,
  h,
  isElementType,
  raw,
  type ElementTypeInput,
  type PropsInput
} from './element';
export { isCustomElementName, isKnownTag, isVoidTag, resolveHtmlTag } from './html';
export { BaseElementProps, Fragment, RawHtml } from './intrinsic';
export { isElementInstance, type Child } from './node';
export { Ref, createRef } from './ref';
export type {
  CollectedOutput,
  CollectMarkerType,
  CollectorKind,
  CollectorType,
  ComponentHooks,
  ComponentType,
  ContextReader,
  ContextType,
  ElementType,
  FragmentType,
  FunctionComponent,
  FunctionComponentType,
  HtmlElementType,
  RawType
} from './types';
