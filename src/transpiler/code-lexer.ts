import type { SourceText } from './source';

/**
 * Host-code lexer.
 *
 * This is not a tokenizer for the host language; it only tracks enough
 * lexical state to answer two questions while walking forward:
 * - Is this `<` the start of markup? (only where an expression may begin)
 * - Where does the current `{...}` slot end? (brace nesting, skipping
 *   strings, template literals, comments and regular expressions)
 *
 * Markup found on the way is handed to `onMarkup`, which returns the offset
 * just past it; the lexer resumes there and treats the markup as a complete
 * operand.
 */

/** Receives the offset of a markup `<` and returns the offset after the markup. */
export type MarkupHandler = (offset: number) => number;

export interface CodeScanOptions {
  /** Exclusive upper bound of the region. */
  end: number;
  /**
   * When set, scanning stops at the first unmatched `}` and returns its
   * offset. `open` is the offset of the matching `{`, used for errors.
   */
  closeOnBrace?: { open: number };
  onMarkup: MarkupHandler;
}

/**
 * Keywords after which an expression (and therefore markup) may start.
 */
const EXPRESSION_KEYWORDS = new Set([
  'return',
  'typeof',
  'instanceof',
  'in',
  'of',
  'new',
  'delete',
  'void',
  'throw',
  'case',
  'do',
  'else',
  'yield',
  'await',
  'default'
]);

const ID_START = /[\p{ID_Start}$_]/u;
const ID_PART = /[\p{ID_Continue}$\u200c\u200d]/u;
const WHITESPACE = /\s/;
/** `<T,` and `<T extends` open generic parameter lists, not markup. */
const GENERIC_TAIL = /\s*(?:,|extends\s)/y;

export function isIdentifierStart(ch: string): boolean {
  return ch !== '' && ID_START.test(ch);
}

export function isIdentifierPart(ch: string): boolean {
  return ch !== '' && ID_PART.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch !== '' && WHITESPACE.test(ch);
}

/** Characters allowed in tag names after the first one. */
export function isTagNamePart(ch: string): boolean {
  return isIdentifierPart(ch) || ch === '-' || ch === '.' || ch === ':';
}

/**
 * Whether the `<` at `offset`, in expression position, opens markup.
 */
export function startsMarkup(
  source: SourceText,
  offset: number,
  end: number
): boolean {
  const next = source.charAt(offset + 1);
  if (next === '>' || next === '/') return true;
  if (!isIdentifierStart(next)) return false;

  let cursor = offset + 2;
  while (cursor < end && isTagNamePart(source.charAt(cursor))) cursor++;
  GENERIC_TAIL.lastIndex = cursor;
  return !GENERIC_TAIL.test(source.text);
}

/**
 * Walks host code from `start`.
 *
 * @returns `options.end`, or the offset of the closing `}` when
 *   `options.closeOnBrace` is set.
 * @throws {ParseError} On unterminated literals/comments, a stray closing
 *   tag, unbalanced braces, or a slot that never closes.
 */
export function scanCode(
  source: SourceText,
  start: number,
  options: CodeScanOptions
): number {
  const { end, closeOnBrace, onMarkup } = options;
  const openBraces: number[] = [];
  let pos = start;
  let expressionAllowed = true;
  let afterDot = false;

  while (pos < end) {
    const ch = source.charAt(pos);
    const next = source.charAt(pos + 1);

    if (isWhitespace(ch)) {
      pos++;
      continue;
    }

    // 1. Comments and regular expressions
    if (ch === '/') {
      if (next === '/') {
        const newline = source.text.indexOf('\n', pos);
        pos = newline === -1 || newline > end ? end : newline;
        continue;
      }
      if (next === '*') {
        const close = source.text.indexOf('*/', pos + 2);
        if (close === -1 || close + 2 > end) {
          throw source.error('unterminated comment', pos);
        }
        pos = close + 2;
        continue;
      }
      if (expressionAllowed) {
        pos = skipRegExp(source, pos, end);
        expressionAllowed = false;
        continue;
      }
      pos++;
      expressionAllowed = true;
      afterDot = false;
      continue;
    }

    // 2. String and template literals
    if (ch === '"' || ch === "'") {
      pos = skipString(source, pos, end);
      expressionAllowed = false;
      afterDot = false;
      continue;
    }
    if (ch === '`') {
      pos = skipTemplate(source, pos, end, onMarkup);
      expressionAllowed = false;
      afterDot = false;
      continue;
    }

    // 3. Braces
    if (ch === '{') {
      openBraces.push(pos);
      pos++;
      expressionAllowed = true;
      afterDot = false;
      continue;
    }
    if (ch === '}') {
      if (openBraces.length === 0) {
        if (closeOnBrace) return pos;
        throw source.error("unbalanced '}'", pos);
      }
      openBraces.pop();
      pos++;
      expressionAllowed = false;
      afterDot = false;
      continue;
    }

    // 4. Markup
    if (ch === '<' && expressionAllowed && startsMarkup(source, pos, end)) {
      if (next === '/') {
        throw source.error('unexpected closing tag', pos);
      }
      pos = onMarkup(pos);
      expressionAllowed = false;
      afterDot = false;
      continue;
    }

    // 5. Words (identifiers, keywords, numbers)
    if (isIdentifierPart(ch)) {
      const wordStart = pos;
      while (pos < end && isIdentifierPart(source.charAt(pos))) pos++;
      const word = source.slice(wordStart, pos);
      expressionAllowed = !afterDot && EXPRESSION_KEYWORDS.has(word);
      afterDot = false;
      continue;
    }

    // 6. Punctuators
    if (ch === ')' || ch === ']') {
      pos++;
      expressionAllowed = false;
      afterDot = false;
      continue;
    }
    if ((ch === '+' || ch === '-') && next === ch) {
      pos += 2;
      expressionAllowed = false;
      afterDot = false;
      continue;
    }
    // `<<`, `<<=` and `<=` are single operators; a second `<` never opens a tag.
    if (ch === '<' && (next === '<' || next === '=')) {
      pos += source.startsWith('<<=', pos) ? 3 : 2;
      expressionAllowed = true;
      afterDot = false;
      continue;
    }
    if (ch === '.') {
      if (source.startsWith('...', pos)) {
        pos += 3;
        expressionAllowed = true;
        afterDot = false;
      } else {
        pos++;
        expressionAllowed = false;
        afterDot = true;
      }
      continue;
    }
    pos++;
    expressionAllowed = true;
    afterDot = false;
  }

  if (closeOnBrace) {
    throw source.error('unterminated expression slot', closeOnBrace.open);
  }
  const unclosed = openBraces.at(-1);
  if (unclosed !== undefined) {
    throw source.error("unbalanced '{'", unclosed);
  }
  return end;
}

function skipString(source: SourceText, start: number, end: number): number {
  const quote = source.charAt(start);
  let pos = start + 1;
  while (pos < end) {
    const ch = source.charAt(pos);
    if (ch === '\\') {
      pos += 2;
      continue;
    }
    if (ch === quote) return pos + 1;
    if (ch === '\n') break;
    pos++;
  }
  throw source.error('unterminated string literal', start);
}

function skipTemplate(
  source: SourceText,
  start: number,
  end: number,
  onMarkup: MarkupHandler
): number {
  let pos = start + 1;
  while (pos < end) {
    const ch = source.charAt(pos);
    if (ch === '\\') {
      pos += 2;
      continue;
    }
    if (ch === '`') return pos + 1;
    if (ch === '$' && source.charAt(pos + 1) === '{') {
      const close = scanCode(source, pos + 2, {
        end,
        closeOnBrace: { open: pos + 1 },
        onMarkup
      });
      pos = close + 1;
      continue;
    }
    pos++;
  }
  throw source.error('unterminated template literal', start);
}

function skipRegExp(source: SourceText, start: number, end: number): number {
  let pos = start + 1;
  let inClass = false;
  while (pos < end) {
    const ch = source.charAt(pos);
    if (ch === '\\') {
      pos += 2;
      continue;
    }
    if (ch === '\n') break;
    if (ch === '[') inClass = true;
    else if (ch === ']') inClass = false;
    else if (ch === '/' && !inClass) {
      pos++;
      while (pos < end && isIdentifierPart(source.charAt(pos))) pos++;
      return pos;
    }
    pos++;
  }
  throw source.error('unterminated regular expression', start);
}
