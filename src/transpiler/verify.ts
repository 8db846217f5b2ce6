import { is, type types } from 'estree-toolkit';
import { parse } from 'meriyah';
import { ParseError, type SourcePosition } from '../errors';
import { isFiniteValue, isRecord, isString } from '../utils/type-guards';

/**
 * Checks whether a runtime value is "node-like" enough to be treated as an
 * ESTree node for the purpose of `estree-toolkit` type guards.
 */
export function isNodeLike(value: unknown): value is types.Node {
  return isRecord(value) && !Array.isArray(value) && isString(value.type);
}

/**
 * Parses transpiled output and returns its ESTree program.
 *
 * Output lines map 1:1 to input lines, so positions of syntax errors are
 * reported against the original file.
 *
 * @throws {ParseError} When the output is not valid JavaScript.
 */
export function verifyOutput(
  code: string,
  options: { sourceType?: 'module' | 'script'; filename?: string } = {}
): types.Program {
  let ast: unknown;
  try {
    ast = parse(code, {
      module: (options.sourceType ?? 'module') === 'module',
      loc: true
    });
  } catch (error) {
    throw new ParseError(
      `generated code does not parse: ${describeParserError(error)}`,
      readErrorPosition(error),
      options.filename
    );
  }

  if (!isNodeLike(ast) || !is.program(ast)) {
    throw new Error('[tagweave] Expected parser output to be an ESTree Program node.');
  }
  return ast;
}

function describeParserError(error: unknown): string {
  if (isRecord(error) && isString(error.description)) return error.description;
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads the position of a parser error.
 *
 * Parser releases disagree on where it lives: `loc.start.{line,column}` on
 * current ones, flat `line`/`column` on older ones.
 */
export function readErrorPosition(error: unknown): SourcePosition {
  if (!isRecord(error)) return { line: 1, column: 0 };

  const loc = error.loc;
  const start = isRecord(loc) && isRecord(loc.start) ? loc.start : loc;
  if (isRecord(start) && isFiniteValue(start.line) && isFiniteValue(start.column)) {
    return { line: start.line, column: start.column };
  }
  if (isFiniteValue(error.line) && isFiniteValue(error.column)) {
    return { line: error.line, column: error.column };
  }
  return { line: 1, column: 0 };
}
