import { withConfig, type ValidationConfig } from '../config';
import type { Child } from '../element/node';
import { RenderPass } from './render-pass';
import { serialize } from './serialize';

export interface RenderOptions {
  /**
   * Configuration active while the tree renders. Elements created during
   * rendering (by components, hooks and deferred producers) are validated
   * against it.
   */
  config?: Partial<ValidationConfig>;
}

/**
 * Renders a tree to HTML.
 *
 * Two phases:
 * 1. Render pass: components run, contexts and collectors scope their
 *    subtrees, refs are bound.
 * 2. Serialization: deferred leaves are produced, collector aggregates
 *    are injected, text and attributes are escaped.
 */
export function renderToString(child: Child, options: RenderOptions = {}): string {
  const run = () => {
    const pass = new RenderPass();
    return serialize(pass.render(child), pass);
  };
  return options.config ? withConfig(options.config, run) : run();
}

export { escapeAttribute, escapeText } from './escape';
export {
  CollectorScope,
  type CollectedBucket,
  type CollectedContent,
  type CollectedRenderOptions
} from './collector-scope';
export type { Primitive } from './primitives';
