import { describe, expect, it, test } from 'vitest';
import { ParseError } from '../../errors';
import { SourceText, parseMarkup } from '..';
import type {
  Attribute,
  AttributeValue,
  ElementNode,
  FragmentNode,
  LiteralValue,
  MarkupNode
} from '../types';
import type { FailureScenario, TestScenario } from './types';

/**
 * Test suite: markup parsing.
 *
 * Coverage:
 * - Attribute forms and literal coercion.
 * - Text whitespace policy and character references.
 * - Slots, spreads and comments.
 * - Parse failures with original positions.
 */
describe('parseMarkup', () => {
  const parse = (code: string): ElementNode | FragmentNode =>
    parseMarkup(new SourceText(code), 0).node;

  /** Compact view of a child for assertions. */
  const describeChild = (source: string, node: MarkupNode): string => {
    switch (node.kind) {
      case 'text':
        return `text:${node.text}`;
      case 'expression':
        return `expr:${source.slice(node.expression.start, node.expression.end)}`;
      case 'spread':
        return `spread:${source.slice(node.expression.start, node.expression.end)}`;
      case 'element':
        return `<${node.name}>`;
      case 'fragment':
        return '<>';
    }
  };

  const childrenOf = (code: string): string[] =>
    parse(code).children.map(child => describeChild(code, child));

  const firstValue = (code: string): AttributeValue => {
    const node = parse(code);
    const attribute = node.kind === 'element' ? node.attributes[0] : undefined;
    if (!attribute || attribute.kind !== 'attribute') {
      throw new Error('expected a named attribute');
    }
    return attribute.value;
  };

  describe('Attribute Literals', () => {
    const scenarios: TestScenario<LiteralValue>[] = [
      {
        id: 'Bare',
        description: 'a bare name is true',
        code: '<input disabled />',
        expected: { type: 'boolean', value: true }
      },
      {
        id: 'Keyword True',
        description: '"true" is a boolean',
        code: '<a x="true" />',
        expected: { type: 'boolean', value: true }
      },
      {
        id: 'Keyword False',
        description: 'keywords ignore letter case',
        code: '<a x="FALSE" />',
        expected: { type: 'boolean', value: false }
      },
      {
        id: 'Keyword None',
        description: '"None" is null',
        code: '<a x="None" />',
        expected: { type: 'null' }
      },
      {
        id: 'Keyword Null',
        description: '"null" is null',
        code: "<a x='null' />",
        expected: { type: 'null' }
      },
      {
        id: 'Keyword NotProvided',
        description: '"NotProvided" is the not-provided marker',
        code: '<a x=NotProvided />',
        expected: { type: 'not-provided' }
      },
      {
        id: 'Decimal',
        description: 'decimal literals are numbers',
        code: '<a x="12.5" />',
        expected: { type: 'number', value: 12.5 }
      },
      {
        id: 'Negative',
        description: 'signed literals are numbers',
        code: '<a x=-3 />',
        expected: { type: 'number', value: -3 }
      },
      {
        id: 'Exponent',
        description: 'exponent literals are numbers',
        code: '<a x="1e3" />',
        expected: { type: 'number', value: 1000 }
      },
      {
        id: 'Unsafe Integer',
        description: 'integers beyond the safe range keep their text',
        code: '<a x="12345678901234567890" />',
        expected: { type: 'string', value: '12345678901234567890' }
      },
      {
        id: 'Overflow',
        description: 'literals that overflow to Infinity keep their text',
        code: '<a x="1e400" />',
        expected: { type: 'string', value: '1e400' }
      },
      {
        id: 'String',
        description: 'anything else is a string',
        code: '<a x="abc" />',
        expected: { type: 'string', value: 'abc' }
      },
      {
        id: 'Unquoted String',
        description: 'unquoted values end at whitespace',
        code: '<a x=abc y />',
        expected: { type: 'string', value: 'abc' }
      },
      {
        id: 'Character Reference',
        description: 'references are decoded in quoted values',
        code: '<a x="a &amp; &#x3C;b&#62;" />',
        expected: { type: 'string', value: 'a & <b>' }
      },
      {
        id: 'Multi-line Value',
        description: 'quoted values spanning lines collapse like text',
        code: '<a x="one\n   two" />',
        expected: { type: 'string', value: 'one two' }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(firstValue(code)).toEqual({ kind: 'literal', literal: expected });
    });

    it('keeps `{...}` values as host code', () => {
      const code = '<a x={count + 1} />';
      const value = firstValue(code);

      expect(value.kind).toBe('expression');
      if (value.kind === 'expression') {
        expect(code.slice(value.expression.start, value.expression.end)).toBe('count + 1');
      }
    });

    it('parses spread attributes in order', () => {
      const code = '<a {...base} x="1" {...rest} />';
      const node = parse(code);
      const kinds = node.kind === 'element'
        ? node.attributes.map((attribute: Attribute) =>
            attribute.kind === 'spread'
              ? `...${code.slice(attribute.expression.start, attribute.expression.end)}`
              : attribute.name
          )
        : [];

      expect(kinds).toEqual(['...base', 'x', '...rest']);
    });
  });

  describe('Children', () => {
    const scenarios: TestScenario<string[]>[] = [
      {
        id: 'Single Line',
        description: 'text without a line break is kept verbatim',
        code: '<p>  Hello, {name}  </p>',
        expected: ['text:  Hello, ', 'expr:name', 'text:  ']
      },
      {
        id: 'Multi-line',
        description: 'lines are trimmed and joined by one space',
        code: '<p>\n  Hello\n\n  world\n</p>',
        expected: ['text:Hello world']
      },
      {
        id: 'Edge Space',
        description: 'edge whitespace on a line shared with a slot becomes one space',
        code: '<p>  \n  New {x}: \n  </p>',
        expected: ['text:New ', 'expr:x', 'text::']
      },
      {
        id: 'Between Slots',
        description: 'a line break between two slots becomes one space',
        code: '<p>{a}\n  {b}</p>',
        expected: ['expr:a', 'text: ', 'expr:b']
      },
      {
        id: 'Between Slot And Tag',
        description: 'a line break between a slot and a tag disappears',
        code: '<p>{a}\n  <b>x</b></p>',
        expected: ['expr:a', '<b>']
      },
      {
        id: 'Comment',
        description: 'markup comments are dropped',
        code: '<p>a <!-- note --> b</p>',
        expected: ['text:a ', 'text: b']
      },
      {
        id: 'Empty Slot',
        description: 'a slot holding only a comment is dropped',
        code: '<p>{/* nothing */}</p>',
        expected: []
      },
      {
        id: 'Spread Child',
        description: '{...items} is a spread child',
        code: '<ul>{...items}</ul>',
        expected: ['spread:items']
      },
      {
        id: 'Entities',
        description: 'character references in text are decoded',
        code: '<p>a &lt; b &amp;&amp; c&nbsp;d</p>',
        expected: ['text:a < b && c\u00a0d']
      },
      {
        id: 'Nested Markup In Slot',
        description: 'braces inside nested markup do not end the slot',
        code: '<p>{ok ? <b>{"}"}</b> : null}</p>',
        expected: ['expr:ok ? <b>{"}"}</b> : null']
      },
      {
        id: 'Fragment',
        description: 'fragments nest',
        code: '<p><>x</></p>',
        expected: ['<>']
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(childrenOf(code)).toEqual(expected);
    });

    it('locates text at its first visible character', () => {
      const node = parse('<p>\n   word\n</p>');
      expect(node.children[0]?.loc).toEqual({ line: 2, column: 3 });
    });

    it('records the line of the closing tag', () => {
      const node = parse('<div>\n  a\n</div>');
      expect(node.loc).toEqual({ line: 1, column: 0 });
      expect(node.endLine).toBe(3);
    });

    it('keeps dotted and hyphenated tag names whole', () => {
      expect(parse('<JSCollector.Collect />')).toMatchObject({ name: 'JSCollector.Collect' });
      expect(parse('<my-widget></my-widget>')).toMatchObject({ name: 'my-widget' });
    });
  });

  describe('Failures', () => {
    const scenarios: FailureScenario[] = [
      {
        id: 'Slot Attribute',
        description: 'a brace attribute must be a spread',
        code: '<div {x}>',
        reason: 'expected "..." to spread attributes',
        line: 1,
        column: 6
      },
      {
        id: 'Empty Value',
        description: 'an attribute expression cannot be empty',
        code: '<a href={ }></a>',
        reason: 'attribute "href" needs an expression inside "{}"',
        line: 1,
        column: 8
      },
      {
        id: 'Missing Value',
        description: '"=" must be followed by a value',
        code: '<a href=></a>',
        reason: 'missing value for attribute "href"',
        line: 1,
        column: 8
      },
      {
        id: 'Unterminated Value',
        description: 'quoted values must close',
        code: '<a href="x></a>',
        reason: 'unterminated attribute value',
        line: 1,
        column: 8
      },
      {
        id: 'Unterminated Tag',
        description: 'the opening tag must end',
        code: '<a href="x"',
        reason: 'unterminated tag',
        line: 1,
        column: 0
      },
      {
        id: 'Unclosed Fragment',
        description: 'fragments must close',
        code: '<>\n  text',
        reason: 'unclosed fragment',
        line: 1,
        column: 0
      },
      {
        id: 'Fragment Closed By Tag',
        description: 'a fragment closes with </>',
        code: '<>x</p>',
        reason: 'mismatched closing tag </p>, expected </>',
        line: 1,
        column: 3
      },
      {
        id: 'Unterminated Markup Comment',
        description: 'markup comments must close',
        code: '<p><!-- x</p>',
        reason: 'unterminated comment',
        line: 1,
        column: 3
      },
      {
        id: 'Unterminated Slot',
        description: 'a slot must close before the input ends',
        code: '<p>\n{ a + (b',
        reason: 'unterminated expression slot',
        line: 2,
        column: 0
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, reason, line, column }) => {
      let caught: unknown;
      try {
        parse(code);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ParseError);
      expect(caught).toMatchObject({ reason, line, column });
    });
  });
});
