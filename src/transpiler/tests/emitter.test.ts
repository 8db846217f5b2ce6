import { describe, expect, it, test } from 'vitest';
import { emitPropKey, emitTagType, transpile, transpileExpression } from '..';
import { identifierLines, literalLines, parseProgram } from './estree-utils';
import type { TestScenario } from './types';

/**
 * Test suite: factory-call emission.
 *
 * Coverage:
 * - Call shape for tags, components, fragments, props and children.
 * - Nested markup inside slots.
 * - Line fidelity, checked by parsing the output and comparing `loc` lines.
 */
describe('Emitter', () => {
  describe('Call Shape', () => {
    const scenarios: TestScenario<string>[] = [
      {
        id: 'Void Tag',
        description: 'no props become null',
        code: '<br/>',
        expected: 'h("br", null)'
      },
      {
        id: 'Text And Slot',
        description: 'text and slots become arguments in order',
        code: '<p class="lead">Hi {name}</p>',
        expected: 'h("p", {class: "lead"}, "Hi ", (name))'
      },
      {
        id: 'Fragment',
        description: 'fragments target h.Fragment',
        code: '<>a{b}</>',
        expected: 'h(h.Fragment, null, "a", (b))'
      },
      {
        id: 'Member Component',
        description: 'dotted names are references; spreads keep their position',
        code: '<Foo.Bar x={1} {...rest} />',
        expected: 'h(Foo.Bar, {x: (1), ...(rest)})'
      },
      {
        id: 'Literals',
        description: 'coerced literals are emitted as values',
        code: '<input disabled value=3 name="q" />',
        expected: 'h("input", {disabled: true, value: 3, name: "q"})'
      },
      {
        id: 'Large Numbers',
        description: 'numbers a double cannot hold are emitted as strings',
        code: '<div id="12345678901234567890" title="1e400" />',
        expected: 'h("div", {id: "12345678901234567890", title: "1e400"})'
      },
      {
        id: 'Quoted Keys',
        description: 'non-identifier prop names are quoted',
        code: '<a data-id="x" on="none" />',
        expected: 'h("a", {"data-id": "x", on: null})'
      },
      {
        id: 'NotProvided',
        description: 'the not-provided literal targets the factory',
        code: '<b hidden=notprovided />',
        expected: 'h("b", {hidden: h.NotProvided})'
      },
      {
        id: 'Custom Element',
        description: 'hyphenated names stay strings',
        code: '<my-widget />',
        expected: 'h("my-widget", null)'
      },
      {
        id: 'Nested Markup',
        description: 'markup inside slots is transpiled in place',
        code: '<ul>{items.map(i => <li>{i}</li>)}</ul>',
        expected: 'h("ul", null, (items.map(i => h("li", null, (i)))))'
      },
      {
        id: 'Spread Child',
        description: 'spread children become spread arguments',
        code: '<ul>{...rows}</ul>',
        expected: 'h("ul", null, ...(rows))'
      },
      {
        id: 'Escaped Text',
        description: 'decoded text is emitted as a string literal',
        code: '<p>say &quot;hi&quot;</p>',
        expected: 'h("p", null, "say \\"hi\\"")'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(transpileExpression(code)).toBe(expected);
    });

    it('targets a custom factory', () => {
      expect(transpileExpression('<>x</>', { factory: 'jsx' })).toBe(
        'jsx(jsx.Fragment, null, "x")'
      );
    });
  });

  describe('Names', () => {
    const tagScenarios: TestScenario<string>[] = [
      { id: 'Lowercase', description: 'tag string', code: 'div', expected: '"div"' },
      { id: 'Capitalized', description: 'identifier', code: 'Greeting', expected: 'Greeting' },
      {
        id: 'Member',
        description: 'member expression',
        code: 'JSCollector.Collect',
        expected: 'JSCollector.Collect'
      },
      { id: 'Hyphenated', description: 'custom element', code: 'x-card', expected: '"x-card"' },
      { id: 'Namespaced', description: 'colon names', code: 'svg:rect', expected: '"svg:rect"' }
    ];

    test.for(tagScenarios)('[$id] tag type: $description', ({ code, expected }) => {
      expect(emitTagType(code)).toBe(expected);
    });

    const keyScenarios: TestScenario<string>[] = [
      { id: 'Identifier', description: 'bare key', code: 'title', expected: 'title' },
      { id: 'Hyphen', description: 'quoted key', code: 'aria-label', expected: '"aria-label"' },
      { id: 'Proto', description: 'computed key', code: '__proto__', expected: '["__proto__"]' }
    ];

    test.for(keyScenarios)('[$id] prop key: $description', ({ code, expected }) => {
      expect(emitPropKey(code)).toBe(expected);
    });
  });

  describe('Line Fidelity', () => {
    const source = [
      'const view = (',
      '  <div',
      '    id="main"',
      '  >',
      '    {title}',
      '    <span>',
      '      {count}',
      '    </span>',
      '  </div>',
      ');',
      'export default view;'
    ].join('\n');

    it('keeps the number of lines', () => {
      const { code } = transpile(source);
      expect(code.split('\n')).toHaveLength(source.split('\n').length);
    });

    it('emits every node on the line it was written on', () => {
      const program = parseProgram(transpile(source).code);

      expect(literalLines(program, 'main')).toEqual([3]);
      expect(identifierLines(program, 'title')).toEqual([5]);
      expect(literalLines(program, 'span')).toEqual([6]);
      expect(identifierLines(program, 'count')).toEqual([7]);
      expect(identifierLines(program, 'view')).toEqual([1, 11]);
    });

    it('describes each top-level markup span', () => {
      const { spans } = transpile(source);
      expect(spans).toEqual([{ loc: { line: 2, column: 2 }, endLine: 9, lines: 8 }]);
    });

    it('keeps host code between spans untouched', () => {
      const code = 'const a = <i>1</i>; // <b>\nconst b = "<p>";';
      expect(transpile(code).code).toBe(
        'const a = h("i", null, "1"); // <b>\nconst b = "<p>";'
      );
    });
  });
});
