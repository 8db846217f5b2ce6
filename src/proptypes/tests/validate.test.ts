import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it, test } from 'vitest';
import { DEFAULT_CONFIG, type ValidationConfig } from '../../config';
import {
  InvalidPropChoiceError,
  InvalidPropNameError,
  InvalidPropValueError
} from '../../errors';
import { NotProvided } from '../../sentinels';
import {
  defaultChoices,
  definePropTypes,
  normalizeBoolean,
  prop,
  required,
  types,
  validateProps,
  type AnyProps
} from '..';

const STRICT: ValidationConfig = DEFAULT_CONFIG;
const LENIENT: ValidationConfig = { strict: false, rejectUnknownProps: true };
const PERMISSIVE: ValidationConfig = { strict: false, rejectUnknownProps: false };

/** Third-party Standard Schema: trims strings, rejects short ones. */
const trimmed: StandardSchemaV1<unknown, string> = {
  '~standard': {
    version: 1,
    vendor: 'acme',
    validate: value => {
      if (typeof value !== 'string') return { issues: [{ message: 'not text' }] };
      const text = value.trim();
      return text.length >= 2
        ? { value: text }
        : { issues: [{ message: 'too short', path: [{ key: 'title' }] }] };
    }
  }
};

const asyncSchema: StandardSchemaV1<unknown, string> = {
  '~standard': {
    version: 1,
    vendor: 'acme',
    validate: value => Promise.resolve({ value: String(value) })
  }
};

const Card = definePropTypes('Card', {
  title: required(types.string),
  count: prop(types.integer, { default: 0 }),
  size: defaultChoices(['sm', 'md']),
  open: types.boolean,
  label: trimmed,
  later: asyncSchema
});

type ValidationScenario = {
  id: string;
  description: string;
  input: AnyProps;
  config: ValidationConfig;
  expected: AnyProps;
};

type RejectionScenario = {
  id: string;
  description: string;
  input: AnyProps;
  config: ValidationConfig;
  error: new (...args: never[]) => Error;
  message: string;
};

/**
 * Test suite: prop validation at instantiation.
 *
 * Coverage:
 * - Strict mode: type and choice checks, coercion.
 * - Non-strict mode: values kept as supplied, boolean normalization only.
 * - Unknown, pass-through and not-supplied props.
 * - Third-party Standard Schema validators.
 */
describe('validateProps', () => {
  describe('Accepted Input', () => {
    const scenarios: ValidationScenario[] = [
      {
        id: 'Coercion',
        description: 'strict mode keeps the coerced value',
        input: { title: 42 },
        config: STRICT,
        expected: { title: '42' }
      },
      {
        id: 'Not Supplied',
        description: 'undefined and NotProvided are dropped',
        input: { title: 'a', count: undefined, size: NotProvided },
        config: STRICT,
        expected: { title: 'a' }
      },
      {
        id: 'Pass-through',
        description: 'data-* and aria-* are kept as they are',
        input: { 'data-id': 7, 'aria-label': 'x' },
        config: STRICT,
        expected: { 'data-id': 7, 'aria-label': 'x' }
      },
      {
        id: 'Lenient Values',
        description: 'non-strict mode keeps invalid values',
        input: { count: 'many', size: 'xl' },
        config: LENIENT,
        expected: { count: 'many', size: 'xl' }
      },
      {
        id: 'Lenient Booleans',
        description: 'non-strict mode reduces unknown spellings with Boolean()',
        input: { open: 'yes' },
        config: LENIENT,
        expected: { open: true }
      },
      {
        id: 'Dropped Unknown',
        description: 'unknown names are dropped when allowed',
        input: { title: 'a', colour: 'red' },
        config: PERMISSIVE,
        expected: { title: 'a' }
      },
      {
        id: 'Third-party Schema',
        description: 'the decoded value of a foreign schema is kept',
        input: { label: '  Hi  ' },
        config: STRICT,
        expected: { label: 'Hi' }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, config, expected }) => {
      expect(validateProps(Card, 'Card', input, config)).toEqual(expected);
    });
  });

  describe('Rejected Input', () => {
    const scenarios: RejectionScenario[] = [
      {
        id: 'Wrong Type',
        description: 'strict mode checks the declared type',
        input: { count: 'many' },
        config: STRICT,
        error: InvalidPropValueError,
        message:
          '<Card>.count: "many" is not a valid value for this prop (expected integer: expected an integer, received "many")'
      },
      {
        id: 'Outside Choices',
        description: 'strict mode checks choices',
        input: { size: 'xl' },
        config: STRICT,
        error: InvalidPropChoiceError,
        message: '<Card>.size: "xl" is not a valid value for this prop (expected one of "sm", "md")'
      },
      {
        id: 'Unknown Strict',
        description: 'strict mode rejects undeclared names',
        input: { colour: 'red' },
        config: STRICT,
        error: InvalidPropNameError,
        message: '<Card>.colour: is not an allowed prop'
      },
      {
        id: 'Unknown Lenient',
        description: 'non-strict mode still rejects unknown names by default',
        input: { colour: 'red' },
        config: LENIENT,
        error: InvalidPropNameError,
        message: '<Card>.colour: is not an allowed prop'
      },
      {
        id: 'Boolean Spelling',
        description: 'strict mode rejects unknown boolean spellings',
        input: { open: 'yes' },
        config: STRICT,
        error: InvalidPropValueError,
        message:
          '<Card>.open: "yes" is not a valid value for this prop (expected boolean: expected a boolean, received "yes")'
      },
      {
        id: 'Foreign Issue Path',
        description: 'issue paths of a foreign schema are reported',
        input: { label: ' x ' },
        config: STRICT,
        error: InvalidPropValueError,
        message:
          '<Card>.label: " x " is not a valid value for this prop (expected acme schema: title: too short)'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, config, error, message }) => {
      expect(() => validateProps(Card, 'Card', input, config)).toThrow(error);
      expect(() => validateProps(Card, 'Card', input, config)).toThrow(message);
    });

    it('refuses asynchronous validators', () => {
      expect(() => validateProps(Card, 'Card', { later: 'x' }, STRICT)).toThrow(
        '[tagweave] Async schema validation is not supported for <Card>.later.'
      );
    });

    it('does not run validators in non-strict mode', () => {
      expect(validateProps(Card, 'Card', { later: 'x' }, LENIENT)).toEqual({ later: 'x' });
    });

    it('keeps the failing value and expectation on the error', () => {
      let caught: unknown;
      try {
        validateProps(Card, 'Card', { size: 'xl' }, STRICT);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidPropChoiceError);
      expect(caught).toMatchObject({
        tagName: 'Card',
        propName: 'size',
        value: 'xl',
        choices: ['sm', 'md']
      });
    });
  });
});

describe('normalizeBoolean', () => {
  const scenarios: Array<{ id: string; value: unknown; strict: boolean; expected: unknown }> = [
    { id: 'Empty String', value: '', strict: true, expected: true },
    { id: 'Own Name', value: 'Checked', strict: true, expected: true },
    { id: 'True Keyword', value: 'TRUE', strict: true, expected: true },
    { id: 'False Keyword', value: 'false', strict: true, expected: false },
    { id: 'Strict Other', value: 'yes', strict: true, expected: 'yes' },
    { id: 'Lenient Zero', value: 0, strict: false, expected: false },
    { id: 'Lenient Object', value: {}, strict: false, expected: true }
  ];

  test.for(scenarios)('[$id] normalizes to $expected', ({ value, strict, expected }) => {
    expect(normalizeBoolean('checked', value, strict)).toEqual(expected);
  });
});
