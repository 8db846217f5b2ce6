import { traverse, type types } from 'estree-toolkit';
import { verifyOutput } from '../verify';

/**
 * Parses transpiled output (as a module) and returns its ESTree program,
 * with `loc` on every node.
 */
export function parseProgram(code: string): types.Program {
  return verifyOutput(code, { sourceType: 'module' });
}

/**
 * Lines on which identifiers named `name` start, in traversal order.
 */
export function identifierLines(program: types.Program, name: string): number[] {
  const lines: number[] = [];

  traverse(program, {
    Identifier(path) {
      const node = path.node;
      if (node?.name === name && node.loc) lines.push(node.loc.start.line);
    }
  });

  return lines;
}

/**
 * Lines on which string literals with value `value` start.
 */
export function literalLines(program: types.Program, value: string): number[] {
  const lines: number[] = [];

  traverse(program, {
    Literal(path) {
      const node = path.node;
      if (node?.value === value && node.loc) lines.push(node.loc.start.line);
    }
  });

  return lines;
}
