import {
  isIdentifierStart,
  isTagNamePart,
  isWhitespace,
  scanCode
} from './code-lexer';
import type { SourceText } from './source';
import {
  coerceLiteral,
  decodeEntities,
  isBlankCode,
  normalizeText,
  type TextNeighbours
} from './text';
import type {
  Attribute,
  AttributeValue,
  ElementNode,
  EmbeddedCode,
  FragmentNode,
  MarkupNode
} from './types';

export interface ParsedMarkup {
  node: ElementNode | FragmentNode;
  /** Offset just past the markup. */
  end: number;
}

/**
 * Parses the markup expression starting at the `<` at `start`.
 *
 * Grammar (informal):
 * ```
 * tag      := '<' name attr* ( '/>' | '>' child* '</' name '>' )
 * fragment := '<>' child* '</>'
 * attr     := name ( '=' ( quoted | unquoted | '{' code '}' ) )? | '{' '...' code '}'
 * child    := text | tag | fragment | '{' code '}' | '{' '...' code '}' | '<!--' ... '-->'
 * ```
 *
 * `{...}` regions are delimited with the host-code lexer, so braces inside
 * strings, templates, comments and nested markup do not end them early.
 *
 * @param limit Exclusive bound; markup may not extend past it.
 * @throws {ParseError} On any malformed markup.
 */
export function parseMarkup(
  source: SourceText,
  start: number,
  limit: number = source.length
): ParsedMarkup {
  const parser = new MarkupParser(source, start, limit);
  const node = parser.parseTag();
  return { node, end: parser.offset };
}

/**
 * Raw child before text normalization; text runs need their neighbours
 * before they can be normalized.
 */
type PendingChild =
  | { kind: 'node'; node: MarkupNode }
  | { kind: 'text'; start: number; end: number };

class MarkupParser {
  private pos: number;

  constructor(
    private readonly source: SourceText,
    start: number,
    private readonly limit: number
  ) {
    this.pos = start;
  }

  get offset(): number {
    return this.pos;
  }

  parseTag(): ElementNode | FragmentNode {
    const open = this.pos;
    const loc = this.source.positionAt(open);
    this.pos++;

    const name = this.readTagName();

    if (name === '') {
      if (this.char() !== '>') {
        throw this.source.error('expected a tag name or ">"', this.pos);
      }
      this.pos++;
      const children = this.parseChildren('', open);
      return {
        kind: 'fragment',
        children,
        loc,
        endLine: this.source.lineAt(this.pos - 1)
      };
    }

    const attributes = this.parseAttributes(open);

    if (this.source.startsWith('/>', this.pos)) {
      this.pos += 2;
      return {
        kind: 'element',
        name,
        attributes,
        children: [],
        loc,
        endLine: this.source.lineAt(this.pos - 1)
      };
    }

    this.pos++; // '>'
    const children = this.parseChildren(name, open);
    return {
      kind: 'element',
      name,
      attributes,
      children,
      loc,
      endLine: this.source.lineAt(this.pos - 1)
    };
  }

  // --- Attributes ---------------------------------------------------------

  private parseAttributes(tagOpen: number): Attribute[] {
    const attributes: Attribute[] = [];

    while (true) {
      this.skipWhitespace();
      if (this.pos >= this.limit) {
        throw this.source.error('unterminated tag', tagOpen);
      }

      const ch = this.char();
      if (ch === '>' || this.source.startsWith('/>', this.pos)) {
        return attributes;
      }

      if (ch === '{') {
        const loc = this.source.positionAt(this.pos);
        const expression = this.readSlot();
        if (!expression.spread) {
          throw this.source.error(
            'expected "..." to spread attributes',
            expression.code.start
          );
        }
        attributes.push({ kind: 'spread', expression: expression.code, loc });
        continue;
      }

      if (!isAttributeNamePart(ch)) {
        throw this.source.error(`unexpected character "${ch}" in tag`, this.pos);
      }

      const loc = this.source.positionAt(this.pos);
      const name = this.readWhile(isAttributeNamePart);

      const beforeEquals = this.pos;
      this.skipWhitespace();
      if (this.char() !== '=') {
        // A bare name is `name={true}`.
        this.pos = beforeEquals;
        attributes.push({
          kind: 'attribute',
          name,
          value: { kind: 'literal', literal: { type: 'boolean', value: true } },
          loc
        });
        continue;
      }

      this.pos++;
      this.skipWhitespace();
      attributes.push({
        kind: 'attribute',
        name,
        value: this.parseAttributeValue(name),
        loc
      });
    }
  }

  private parseAttributeValue(name: string): AttributeValue {
    const ch = this.char();

    if (ch === '"' || ch === "'") {
      const close = this.source.text.indexOf(ch, this.pos + 1);
      if (close === -1 || close >= this.limit) {
        throw this.source.error('unterminated attribute value', this.pos);
      }
      const raw = this.source.slice(this.pos + 1, close);
      this.pos = close + 1;
      return {
        kind: 'literal',
        literal: coerceLiteral(decodeEntities(normalizeText(raw)))
      };
    }

    if (ch === '{') {
      const start = this.pos;
      const slot = this.readSlot();
      if (slot.spread || isBlankCode(this.slotText(slot.code))) {
        throw this.source.error(
          `attribute "${name}" needs an expression inside "{}"`,
          start
        );
      }
      return { kind: 'expression', expression: slot.code };
    }

    const raw = this.readWhile(
      c =>
        !isWhitespace(c) &&
        c !== '>' &&
        c !== '{' &&
        c !== '"' &&
        c !== "'" &&
        !this.source.startsWith('/>', this.pos)
    );
    if (raw === '') {
      throw this.source.error(`missing value for attribute "${name}"`, this.pos);
    }
    return { kind: 'literal', literal: coerceLiteral(decodeEntities(raw)) };
  }

  // --- Children -----------------------------------------------------------

  private parseChildren(name: string, open: number): MarkupNode[] {
    const pending: PendingChild[] = [];

    while (true) {
      if (this.pos >= this.limit) {
        throw this.source.error(
          name === '' ? 'unclosed fragment' : `unclosed <${name}>`,
          open
        );
      }

      if (this.source.startsWith('</', this.pos)) {
        this.parseClosingTag(name);
        break;
      }

      if (this.source.startsWith('<!--', this.pos)) {
        this.skipComment();
        continue;
      }

      if (this.startsChildTag()) {
        pending.push({ kind: 'node', node: this.parseTag() });
        continue;
      }

      if (this.char() === '{') {
        const loc = this.source.positionAt(this.pos);
        const slot = this.readSlot();
        const endLine = this.source.lineAt(this.pos - 1);
        if (slot.spread) {
          pending.push({
            kind: 'node',
            node: { kind: 'spread', expression: slot.code, loc, endLine }
          });
        } else if (!isBlankCode(this.slotText(slot.code))) {
          pending.push({
            kind: 'node',
            node: { kind: 'expression', expression: slot.code, loc, endLine }
          });
        }
        continue;
      }

      const start = this.pos;
      this.pos++;
      while (
        this.pos < this.limit &&
        this.char() !== '{' &&
        !this.source.startsWith('</', this.pos) &&
        !this.source.startsWith('<!--', this.pos) &&
        !this.startsChildTag()
      ) {
        this.pos++;
      }
      pending.push({ kind: 'text', start, end: this.pos });
    }

    return this.finishChildren(pending);
  }

  private finishChildren(pending: PendingChild[]): MarkupNode[] {
    const children: MarkupNode[] = [];

    pending.forEach((child, index) => {
      if (child.kind === 'node') {
        children.push(child.node);
        return;
      }

      const neighbours: TextNeighbours = {
        before: neighbourKind(pending[index - 1]),
        after: neighbourKind(pending[index + 1])
      };
      const raw = this.source.slice(child.start, child.end);
      const text = decodeEntities(normalizeText(raw, neighbours));
      if (text === '') return;

      const firstVisible = raw.search(/\S/);
      const offset = child.start + (firstVisible === -1 ? 0 : firstVisible);
      children.push({
        kind: 'text',
        text,
        loc: this.source.positionAt(offset),
        endLine: this.source.lineAt(child.end - 1)
      });
    });

    return children;
  }

  private parseClosingTag(expected: string): void {
    const closeStart = this.pos;
    this.pos += 2;
    this.skipWhitespace();
    const name = this.readTagName();
    this.skipWhitespace();
    if (this.char() !== '>') {
      throw this.source.error('expected ">" to end the closing tag', this.pos);
    }
    this.pos++;
    if (name !== expected) {
      const found = name === '' ? '</>' : `</${name}>`;
      const wanted = expected === '' ? '</>' : `</${expected}>`;
      throw this.source.error(
        `mismatched closing tag ${found}, expected ${wanted}`,
        closeStart
      );
    }
  }

  private skipComment(): void {
    const close = this.source.text.indexOf('-->', this.pos + 4);
    if (close === -1 || close + 3 > this.limit) {
      throw this.source.error('unterminated comment', this.pos);
    }
    this.pos = close + 3;
  }

  // --- Shared helpers -----------------------------------------------------

  /**
   * Reads a `{...}` region starting at the current `{` and leaves the cursor
   * after the closing `}`.
   */
  private readSlot(): { code: EmbeddedCode; spread: boolean } {
    const open = this.pos;
    const close = scanCode(this.source, open + 1, {
      end: this.limit,
      closeOnBrace: { open },
      onMarkup: offset => parseMarkup(this.source, offset, this.limit).end
    });
    this.pos = close + 1;

    SPREAD_PREFIX.lastIndex = open + 1;
    const spread =
      SPREAD_PREFIX.test(this.source.text) && SPREAD_PREFIX.lastIndex <= close;
    const start = spread ? SPREAD_PREFIX.lastIndex : open + 1;
    return {
      code: { start, end: close, loc: this.source.positionAt(start) },
      spread
    };
  }

  private slotText(code: EmbeddedCode): string {
    return this.source.slice(code.start, code.end);
  }

  private startsChildTag(): boolean {
    if (this.char() !== '<') return false;
    const next = this.source.charAt(this.pos + 1);
    return next === '>' || isIdentifierStart(next);
  }

  private readTagName(): string {
    if (!isIdentifierStart(this.char())) return '';
    return this.readWhile(isTagNamePart);
  }

  private readWhile(predicate: (ch: string) => boolean): string {
    const start = this.pos;
    while (this.pos < this.limit && predicate(this.char())) this.pos++;
    return this.source.slice(start, this.pos);
  }

  private skipWhitespace(): void {
    while (this.pos < this.limit && isWhitespace(this.char())) this.pos++;
  }

  private char(): string {
    return this.pos < this.limit ? this.source.charAt(this.pos) : '';
  }
}

const SPREAD_PREFIX = /\s*\.\.\./y;

function isAttributeNamePart(ch: string): boolean {
  return isTagNamePart(ch) || ch === '@';
}

function neighbourKind(child: PendingChild | undefined): TextNeighbours['before'] {
  if (!child) return 'none';
  if (child.kind === 'text') return 'node';
  return child.node.kind === 'expression' || child.node.kind === 'spread'
    ? 'expression'
    : 'node';
}
