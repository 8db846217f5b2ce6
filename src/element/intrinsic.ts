import { types } from '../proptypes/builtins';
import { required } from '../proptypes/spec';
import { definePropTypes } from '../proptypes/table';
import type { FragmentType, RawType } from './types';

/** Props every component and fragment declares on top of its own. */
export const BaseElementProps = definePropTypes('Element', {
  id: types.string,
  class: types.string
});

export type BaseElementProps = typeof BaseElementProps.propsType;

const fragment: FragmentType = {
  kind: 'fragment',
  name: 'Fragment',
  acceptsChildren: true,
  propTypes: definePropTypes('Fragment', {}, { extends: BaseElementProps })
};

const rawHtml: RawType = {
  kind: 'raw',
  name: 'RawHtml',
  acceptsChildren: false,
  propTypes: definePropTypes('RawHtml', { text: required(types.string) })
};

/** Groups children without a wrapper tag (`<>...</>` in markup). */
export const Fragment = Object.freeze(fragment);

/** Pre-rendered HTML inserted as is. Created with `raw()` / `h.raw()`. */
export const RawHtml = Object.freeze(rawHtml);
