import { escapeAttribute, escapeText } from './escape';
import type { DeferredPrimitive, Primitive, TagPrimitive } from './primitives';

/** Expands a deferred leaf once its producer can run. */
export interface DeferredExpander {
  expandDeferred(node: DeferredPrimitive): Primitive[];
}

/**
 * Writes primitives as HTML.
 *
 * Deferred leaves are produced and expanded here, in document order, so
 * every ref bound during the render pass is readable by their producers.
 * Collector placeholders are replaced by the collector's aggregate.
 */
export function serialize(
  primitives: readonly Primitive[],
  expander: DeferredExpander
): string {
  const out: string[] = [];
  write(primitives, out, expander);
  return out.join('');
}

function write(
  primitives: readonly Primitive[],
  out: string[],
  expander: DeferredExpander
): void {
  for (const node of primitives) {
    switch (node.kind) {
      case 'text':
        out.push(escapeText(node.text));
        break;
      case 'raw':
        out.push(node.html);
        break;
      case 'tag':
        writeTag(node, out, expander);
        break;
      case 'deferred':
        write(expander.expandDeferred(node), out, expander);
        break;
      case 'collected':
        write(node.collector.collect(node.options), out, expander);
        break;
    }
  }
}

function writeTag(node: TagPrimitive, out: string[], expander: DeferredExpander): void {
  const attributes = node.attributes
    .map(([name, value]) =>
      value === true ? ` ${name}` : ` ${name}="${escapeAttribute(value)}"`
    )
    .join('');

  if (node.isVoid) {
    out.push(`<${node.tag}${attributes} />`);
    return;
  }

  out.push(`<${node.tag}${attributes}>`);
  write(node.children, out, expander);
  out.push(`</${node.tag}>`);
}
