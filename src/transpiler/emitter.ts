import { parseMarkup } from './parser';
import { scanRange } from './scanner';
import type { SourceText } from './source';
import type {
  Attribute,
  EmbeddedCode,
  LiteralValue,
  MarkupNode,
  SourceSpan
} from './types';

export interface EmitOptions {
  /** Identifier of the element factory. */
  factory: string;
}

/**
 * Rewrites every markup span in `[start, end)` and copies host code through.
 *
 * Used for the whole input and, recursively, for each `{...}` region inside
 * markup (which may hold markup of its own).
 */
export function emitRange(
  source: SourceText,
  start: number,
  end: number,
  options: EmitOptions
): string {
  return scanRange(source, start, end)
    .map(span => (span.kind === 'code' ? span.text : emitSpan(source, span, options)))
    .join('');
}

/**
 * Emits one markup span as a factory call expression.
 *
 * Line fidelity contract:
 * - The output for a span contains exactly as many line breaks as the span.
 * - Each node, attribute and child starts on the line it was written on;
 *   line breaks are inserted between call arguments to get there.
 *
 * Lines only move forward while walking the tree in source order, so a
 * node is never emitted past its own line.
 */
export function emitSpan(
  source: SourceText,
  span: SourceSpan,
  options: EmitOptions
): string {
  const { node } = parseMarkup(source, span.start, span.end);
  const emitter = new CallEmitter(source, options, span.loc.line);
  emitter.node(node);
  emitter.moveTo(span.endLine);
  return emitter.toString();
}

const IDENTIFIER = /^[\p{ID_Start}$_][\p{ID_Continue}$]*$/u;
const MEMBER_PATH = /^[\p{ID_Start}$_][\p{ID_Continue}$]*(?:\.[\p{ID_Start}$_][\p{ID_Continue}$]*)*$/u;

/**
 * Element type expression for a tag name: capitalized names and dotted
 * paths are host references, everything else is a tag string.
 */
export function emitTagType(name: string): string {
  const isReference =
    MEMBER_PATH.test(name) && (/^[\p{Lu}$_]/u.test(name) || name.includes('.'));
  return isReference ? name : JSON.stringify(name);
}

/** Object literal key for a prop name. */
export function emitPropKey(name: string): string {
  if (name === '__proto__') return '["__proto__"]';
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

class CallEmitter {
  private readonly parts: string[] = [];
  private line: number;

  constructor(
    private readonly source: SourceText,
    private readonly options: EmitOptions,
    startLine: number
  ) {
    this.line = startLine;
  }

  toString(): string {
    return this.parts.join('');
  }

  /** Pads with line breaks until the output reaches `line`. */
  moveTo(line: number): void {
    while (this.line < line) {
      this.parts.push('\n');
      this.line++;
    }
  }

  node(node: MarkupNode): void {
    this.moveTo(node.loc.line);
    const { factory } = this.options;

    switch (node.kind) {
      case 'element':
        this.write(`${factory}(${emitTagType(node.name)}, `);
        this.props(node.attributes);
        this.children(node.children);
        this.moveTo(node.endLine);
        this.write(')');
        return;
      case 'fragment':
        this.write(`${factory}(${factory}.Fragment, null`);
        this.children(node.children);
        this.moveTo(node.endLine);
        this.write(')');
        return;
      case 'text':
        this.write(JSON.stringify(node.text));
        return;
      case 'expression':
        this.write('(');
        this.code(node.expression);
        this.write(')');
        return;
      case 'spread':
        this.write('...(');
        this.code(node.expression);
        this.write(')');
        return;
    }
  }

  private children(children: readonly MarkupNode[]): void {
    for (const child of children) {
      this.write(', ');
      this.node(child);
    }
  }

  private props(attributes: readonly Attribute[]): void {
    if (attributes.length === 0) {
      this.write('null');
      return;
    }

    this.write('{');
    attributes.forEach((attribute, index) => {
      if (index > 0) this.write(', ');
      this.moveTo(attribute.loc.line);

      if (attribute.kind === 'spread') {
        this.write('...(');
        this.code(attribute.expression);
        this.write(')');
        return;
      }

      this.write(`${emitPropKey(attribute.name)}: `);
      const { value } = attribute;
      if (value.kind === 'literal') {
        this.write(this.literal(value.literal));
      } else {
        this.write('(');
        this.code(value.expression);
        this.write(')');
      }
    });
    this.write('}');
  }

  private literal(literal: LiteralValue): string {
    switch (literal.type) {
      case 'string':
        return JSON.stringify(literal.value);
      case 'number':
        return String(literal.value);
      case 'boolean':
        return String(literal.value);
      case 'null':
        return 'null';
      case 'not-provided':
        return `${this.options.factory}.NotProvided`;
    }
  }

  /** Host code, transpiled in place; its line breaks are kept as written. */
  private code(code: EmbeddedCode): void {
    this.moveTo(code.loc.line);
    const text = emitRange(this.source, code.start, code.end, this.options);
    this.parts.push(text);
    this.line += countLineBreaks(text);
  }

  private write(text: string): void {
    this.parts.push(text);
  }
}

function countLineBreaks(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}
