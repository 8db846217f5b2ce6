import { scanCode } from './code-lexer';
import { parseMarkup } from './parser';
import { SourceText } from './source';
import type { SourceSpan } from './types';

/**
 * Splits `source` into alternating host-code and markup spans.
 *
 * Only outermost markup is reported: markup nested in a `{...}` slot of
 * other markup belongs to the enclosing span. Markup inside template
 * literal substitutions or parentheses of host code is outermost and gets
 * its own span.
 *
 * The concatenated `text` of all spans is exactly `source`.
 *
 * @throws {ParseError} When the code or a markup region is malformed.
 */
export function scan(source: string, filename?: string): SourceSpan[] {
  const text = new SourceText(source, filename);
  return scanRange(text, 0, text.length);
}

/**
 * {@link scan} over the `[start, end)` region of an existing
 * {@link SourceText}, reporting offsets and positions of the full input.
 */
export function scanRange(
  source: SourceText,
  start: number,
  end: number
): SourceSpan[] {
  const spans: SourceSpan[] = [];
  let cursor = start;

  const push = (kind: SourceSpan['kind'], from: number, to: number): void => {
    if (from === to) return;
    spans.push({
      kind,
      start: from,
      end: to,
      text: source.slice(from, to),
      loc: source.positionAt(from),
      endLine: source.lineAt(Math.max(from, to - 1))
    });
  };

  scanCode(source, start, {
    end,
    onMarkup: offset => {
      const markup = parseMarkup(source, offset, end);
      push('code', cursor, offset);
      push('markup', offset, markup.end);
      cursor = markup.end;
      return markup.end;
    }
  });
  push('code', cursor, end);

  return spans;
}
