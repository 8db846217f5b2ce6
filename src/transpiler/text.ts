import type { LiteralValue } from './types';

/**
 * Text rules applied at parse time: whitespace normalization, character
 * reference decoding and attribute literal coercion.
 */

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0'
};

const ENTITY = /&(?:#(\d+)|#[xX]([0-9a-fA-F]+)|([a-zA-Z]+));/g;

/**
 * Decodes character references. Unknown named references and code points
 * outside the Unicode range are left as written.
 */
export function decodeEntities(text: string): string {
  if (!text.includes('&')) return text;
  return text.replace(
    ENTITY,
    (match, decimal: string | undefined, hex: string | undefined, name: string | undefined) => {
      if (name !== undefined) return NAMED_ENTITIES[name] ?? match;
      const codePoint =
        decimal !== undefined ? Number(decimal) : Number.parseInt(hex ?? '', 16);
      return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
    }
  );
}

/** Neighbours of a text run inside its parent's children. */
export interface TextNeighbours {
  /** A node (of any kind) precedes the text. */
  before: 'none' | 'node' | 'expression';
  after: 'none' | 'node' | 'expression';
}

const NO_NEIGHBOURS: TextNeighbours = { before: 'none', after: 'none' };

/**
 * Normalizes a run of literal text.
 *
 * 1. Text without a line break is kept verbatim.
 * 2. Whitespace-only text with a line break disappears, except between two
 *    expression slots, where it becomes one space.
 * 3. Otherwise every line is trimmed, blank lines are dropped and the rest
 *    are joined by single spaces. Edge whitespace survives as one space
 *    per {@link keepsEdgeSpace}.
 */
export function normalizeText(
  raw: string,
  neighbours: TextNeighbours = NO_NEIGHBOURS
): string {
  if (!/[\r\n]/.test(raw)) return raw;

  if (raw.trim() === '') {
    return neighbours.before === 'expression' &&
      neighbours.after === 'expression'
      ? ' '
      : '';
  }

  const lines = raw.split(/\r\n|\r|\n/);
  const body = lines
    .map(line => line.trim())
    .filter(line => line !== '')
    .join(' ');

  const first = lines[0] ?? '';
  const last = lines[lines.length - 1] ?? '';

  const leading = keepsEdgeSpace(first, /^\s/, neighbours.before);
  const trailing = keepsEdgeSpace(last, /\s$/, neighbours.after);

  return `${leading ? ' ' : ''}${body}${trailing ? ' ' : ''}`;
}

/**
 * An edge line with content keeps its edge whitespace (as one space) when a
 * neighbour sits on that line; a blank edge line only does so next to an
 * expression slot.
 */
function keepsEdgeSpace(
  line: string,
  edgeWhitespace: RegExp,
  neighbour: TextNeighbours['before']
): boolean {
  if (neighbour === 'none') return false;
  if (line.trim() === '') return neighbour === 'expression';
  return edgeWhitespace.test(line);
}

const NUMBER_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Coerces an attribute literal.
 *
 * Precedence: keywords (`true`, `false`, `none`/`null`, `notprovided`,
 * any letter case) → decimal number → string.
 *
 * A decimal form whose value is not finite, or is an integer beyond
 * `Number.MAX_SAFE_INTEGER`, stays a string with its text unchanged.
 */
export function coerceLiteral(raw: string): LiteralValue {
  switch (raw.toLowerCase()) {
    case 'true':
      return { type: 'boolean', value: true };
    case 'false':
      return { type: 'boolean', value: false };
    case 'none':
    case 'null':
      return { type: 'null' };
    case 'notprovided':
      return { type: 'not-provided' };
  }
  if (NUMBER_LITERAL.test(raw)) {
    const value = Number(raw);
    const exact =
      Number.isFinite(value) &&
      (!Number.isInteger(value) || Number.isSafeInteger(value));
    if (exact) {
      return { type: 'number', value };
    }
  }
  return { type: 'string', value: raw };
}

/**
 * Whether host code consists only of whitespace and comments.
 */
export function isBlankCode(code: string): boolean {
  return code.replace(/\/\*[\s\S]*?\*\/|\/\/[^\n]*/g, '').trim() === '';
}
