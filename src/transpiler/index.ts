import { emitRange, emitSpan } from './emitter';
import { scanRange } from './scanner';
import { SourceText } from './source';
import type { MarkupSpanInfo, TranspileOptions, TranspileResult } from './types';
import { verifyOutput } from './verify';

export { scan, scanRange } from './scanner';
export { parseMarkup, type ParsedMarkup } from './parser';
export { emitRange, emitSpan, emitTagType, emitPropKey } from './emitter';
export { coerceLiteral, decodeEntities, normalizeText } from './text';
export { SourceText } from './source';
export { verifyOutput } from './verify';
export type * from './types';

/**
 * Rewrites markup embedded in `source` into factory calls.
 *
 * Pipeline overview
 * -----------------
 * 1. Scan
 *    - Split the input into host-code and markup spans.
 *
 * 2. Emit
 *    - Host code is copied through untouched.
 *    - Each markup span is parsed and re-emitted as nested
 *      `factory(type, props, ...children)` calls occupying the same lines.
 *
 * 3. Verify (optional)
 *    - Parse the result to surface syntax errors against original positions.
 *
 * Guarantees:
 * - `result.code` has the same number of lines as `source`.
 * - Failures are reported as `ParseError` with original line/column.
 *
 * @example
 * ```ts
 * transpile('const view = <p class="lead">Hi {name}</p>;').code;
 * // const view = h("p", {class: "lead"}, "Hi ", (name));
 * ```
 */
export function transpile(
  source: string,
  options: TranspileOptions = {}
): TranspileResult {
  const { factory = 'h', verify = false, logger, verbose = false } = options;
  const text = new SourceText(source, options.filename);

  // 1. Scan
  const spans = scanRange(text, 0, text.length);

  // 2. Emit
  const markupSpans: MarkupSpanInfo[] = [];
  const code = spans
    .map(span => {
      if (span.kind === 'code') return span.text;

      const output = emitSpan(text, span, { factory });
      markupSpans.push({
        loc: span.loc,
        endLine: span.endLine,
        lines: span.endLine - span.loc.line + 1
      });
      if (verbose && logger) {
        const lines = span.endLine - span.loc.line + 1;
        logger.log(
          `[tagweave] ${options.filename ?? '<input>'}:${span.loc.line}:${span.loc.column} markup span, ${lines} line(s), ${output.length} chars`
        );
      }
      return output;
    })
    .join('');

  // 3. Verify
  if (verify) {
    verifyOutput(code, {
      sourceType: options.sourceType,
      filename: options.filename
    });
  }

  return { code, spans: markupSpans };
}

/**
 * Transpiles a single markup expression (no surrounding host code).
 */
export function transpileExpression(
  markup: string,
  options: Pick<TranspileOptions, 'factory' | 'filename'> = {}
): string {
  const text = new SourceText(markup, options.filename);
  return emitRange(text, 0, text.length, { factory: options.factory ?? 'h' });
}
