import type { SourcePosition } from '../errors';

/**
 * Contiguous region of the input, either host code (copied verbatim) or one
 * top-level markup expression (rewritten by the emitter).
 *
 * `start`/`end` are offsets into the full input; `loc` is the position of
 * the first character and `endLine` the line of the last one.
 */
export interface SourceSpan {
  kind: 'code' | 'markup';
  start: number;
  end: number;
  text: string;
  loc: SourcePosition;
  endLine: number;
}

/**
 * Host code embedded in markup (`{...}` slots, attribute expressions,
 * spreads), addressed by offsets into the original input so that nested
 * markup can be transpiled in place with original positions.
 */
export interface EmbeddedCode {
  start: number;
  end: number;
  loc: SourcePosition;
}

/** Attribute literal after keyword/number coercion. */
export type LiteralValue =
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'boolean'; value: boolean }
  | { type: 'null' }
  | { type: 'not-provided' };

export type AttributeValue =
  | { kind: 'literal'; literal: LiteralValue }
  | { kind: 'expression'; expression: EmbeddedCode };

export type Attribute =
  | {
      kind: 'attribute';
      name: string;
      value: AttributeValue;
      loc: SourcePosition;
    }
  | { kind: 'spread'; expression: EmbeddedCode; loc: SourcePosition };

interface NodeBase {
  loc: SourcePosition;
  /** Line of the node's last character (closing `>` for tags). */
  endLine: number;
}

export interface ElementNode extends NodeBase {
  kind: 'element';
  name: string;
  attributes: Attribute[];
  children: MarkupNode[];
}

export interface FragmentNode extends NodeBase {
  kind: 'fragment';
  children: MarkupNode[];
}

export interface ExpressionSlotNode extends NodeBase {
  kind: 'expression';
  expression: EmbeddedCode;
}

export interface RawTextNode extends NodeBase {
  kind: 'text';
  /** Whitespace-normalized, entity-decoded text. */
  text: string;
}

export interface SpreadChildNode extends NodeBase {
  kind: 'spread';
  expression: EmbeddedCode;
}

export type MarkupNode =
  | ElementNode
  | FragmentNode
  | ExpressionSlotNode
  | RawTextNode
  | SpreadChildNode;

/** Minimal logging surface accepted by the transpiler. */
export interface Logger {
  log(...args: unknown[]): void;
}

export interface TranspileOptions {
  /**
   * Identifier the emitted calls target.
   * @default 'h'
   */
  factory?: string;
  /** Reported in {@link ParseError} messages. */
  filename?: string;
  /**
   * Parse the output with a JavaScript parser and report syntax errors as
   * `ParseError`. Only meaningful for plain JavaScript input.
   * @default false
   */
  verify?: boolean;
  /**
   * Grammar used by `verify`.
   * @default 'module'
   */
  sourceType?: 'module' | 'script';
  logger?: Logger;
  /** Emit one log line per markup span through `logger`. */
  verbose?: boolean;
}

export interface MarkupSpanInfo {
  loc: SourcePosition;
  endLine: number;
  /** Number of lines the span (and its output) occupies. */
  lines: number;
}

export interface TranspileResult {
  code: string;
  spans: MarkupSpanInfo[];
}
