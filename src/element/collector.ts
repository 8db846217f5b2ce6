import { types } from '../proptypes/builtins';
import { defaultChoices, prop } from '../proptypes/spec';
import { definePropTypes } from '../proptypes/table';
import type { CollectMarkerType, CollectorKind, CollectorType } from './types';

export interface CollectorDefinition {
  name: string;
  /** Hooks folded into this collector (`renderJs*` or `renderCss*`), or none. */
  kind: CollectorKind | null;
  /** Tag wrapping the aggregate when it is injected. */
  wrapTag?: string | null;
  /** Default of the `type` attribute of the wrap tag. */
  defaultType?: string;
}

/** Namespace used when a marker or hook does not name one. */
export const DEFAULT_NAMESPACE = 'default';

/**
 * Defines a collector and its marker element.
 *
 * A collector renders its children unchanged and gathers, from its subtree:
 * 1. the children of its `Collect` markers;
 * 2. the output of the global hooks of its kind (once per definition);
 * 3. the output of the per-instance hooks of its kind.
 *
 * The aggregate is injected before or after the children
 * (`renderPosition`), or handed to a ref bound on the collector.
 */
export function defineCollector(definition: CollectorDefinition): CollectorType {
  const { name } = definition;

  const marker: CollectMarkerType = {
    kind: 'collect',
    name: `${name}.Collect`,
    collectorName: name,
    acceptsChildren: true,
    propTypes: definePropTypes(`${name}.Collect`, {
      namespace: prop(types.string, { default: DEFAULT_NAMESPACE })
    })
  };

  const collector: CollectorType = {
    kind: 'collector',
    name,
    collectorKind: definition.kind,
    wrapTag: definition.wrapTag ?? null,
    Collect: Object.freeze(marker),
    acceptsChildren: true,
    propTypes: definePropTypes(name, {
      renderPosition: defaultChoices([null, 'before', 'after']),
      type: prop(types.string, { default: definition.defaultType })
    })
  };
  return Object.freeze(collector);
}

/** Gathers `renderJs` / `renderJsGlobal` output into one `<script>`. */
export const JSCollector = defineCollector({
  name: 'JSCollector',
  kind: 'js',
  wrapTag: 'script',
  defaultType: 'text/javascript'
});

/** Gathers `renderCss` / `renderCssGlobal` output into one `<style>`. */
export const CSSCollector = defineCollector({
  name: 'CSSCollector',
  kind: 'css',
  wrapTag: 'style',
  defaultType: 'text/css'
});
