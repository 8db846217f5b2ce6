import { describe, expect, it, test } from 'vitest';
import { SchemaDefinitionError } from '../../errors';
import { Ref } from '../../element/ref';
import {
  choices,
  defaultChoices,
  definePropTypes,
  prop,
  required,
  types,
  validateWithSchema,
  type PropDeclarations
} from '..';

type DefinitionFailure = {
  id: string;
  description: string;
  declarations: PropDeclarations;
  message: string;
};

/**
 * Test suite: prop type tables and built-in types.
 *
 * Coverage:
 * - Definition-time rejection of conflicting specs.
 * - Table composition (extend, override, exclude).
 * - Built-in type checks and coercions.
 */
describe('definePropTypes', () => {
  describe('Definition Errors', () => {
    const scenarios: DefinitionFailure[] = [
      {
        id: 'Required With Default',
        description: 'a required prop cannot have a default',
        declarations: { label: required(prop(types.string, { default: 'x' })) },
        message: '<Button>.label: a required prop cannot have a default value'
      },
      {
        id: 'Required With Factory',
        description: 'a required prop cannot have a default factory',
        declarations: { items: required(prop(types.array(), { factory: () => [] })) },
        message: '<Button>.items: a required prop cannot have a default value'
      },
      {
        id: 'Required Default Choices',
        description: 'defaultChoices always has a default',
        declarations: { size: required(defaultChoices(['md', 'lg'])) },
        message: '<Button>.size: a defaultChoices prop cannot be required'
      },
      {
        id: 'Empty Choices',
        description: 'a choice list needs at least one entry',
        declarations: { size: choices([]) },
        message: '<Button>.size: choices must be a non-empty list'
      },
      {
        id: 'Default Fails Type',
        description: 'the default must satisfy the declared type',
        declarations: { count: prop(types.integer, { default: 1.5 }) },
        message:
          '<Button>.count: default value 1.5 is not a valid integer (expected an integer, received 1.5)'
      },
      {
        id: 'Default Outside Choices',
        description: 'the default must be one of the choices',
        declarations: { size: choices(['sm', 'md'], { type: types.string, default: 'xl' }) },
        message: '<Button>.size: default value "xl" is not one of the choices'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ declarations, message }) => {
      expect(() => definePropTypes('Button', declarations)).toThrow(SchemaDefinitionError);
      expect(() => definePropTypes('Button', declarations)).toThrow(message);
    });

    it('accepts an undefined default as "no default"', () => {
      const table = definePropTypes('Link', { rel: prop(types.string, { default: undefined }) });
      expect(table.get('rel')?.hasDefault).toBe(true);
    });
  });

  describe('Composition', () => {
    const Base = definePropTypes('Base', {
      id: types.string,
      size: defaultChoices(['md', 'sm']),
      tone: types.string
    });

    it('keeps the parent order, replaces in place and appends new names', () => {
      const table = definePropTypes(
        'Child',
        { size: defaultChoices(['lg', 'xl']), label: required(types.string) },
        { extends: Base }
      );

      expect(table.names).toEqual(['id', 'size', 'tone', 'label']);
      expect(table.get('size')?.default).toBe('lg');
      expect(table.get('label')?.required).toBe(true);
    });

    it('removes excluded names', () => {
      const table = definePropTypes('Slim', {}, { extends: Base, exclude: ['tone'] });
      expect(table.names).toEqual(['id', 'size']);
      expect(table.has('tone')).toBe(false);
    });

    it('treats a bare type as an optional prop', () => {
      const table = definePropTypes('Plain', { title: types.string });
      expect(table.get('title')).toMatchObject({ kind: 'plain', required: false, hasDefault: false });
    });

    it('knows which props are boolean', () => {
      const table = definePropTypes('Toggle', { on: types.boolean, label: types.string });
      expect(table.isBoolean('on')).toBe(true);
      expect(table.isBoolean('label')).toBe(false);
      expect(table.isBoolean('missing')).toBe(false);
    });

    it('freezes tables', () => {
      expect(Object.isFrozen(Base)).toBe(true);
    });
  });
});

describe('Built-in Types', () => {
  type TypeScenario = {
    id: string;
    description: string;
    run: () => ReturnType<typeof validateWithSchema>;
    expected: ReturnType<typeof validateWithSchema>;
  };

  const check = (type: Parameters<typeof validateWithSchema>[0], value: unknown) => () =>
    validateWithSchema(type, value, 'test');

  class Point {}
  const point = new Point();
  const ref = new Ref();

  const scenarios: TypeScenario[] = [
    {
      id: 'String Coercion',
      description: 'finite numbers become strings',
      run: check(types.string, 3),
      expected: { ok: true, value: '3' }
    },
    {
      id: 'String Rejects NaN',
      description: 'NaN is not a string',
      run: check(types.string, Number.NaN),
      expected: { ok: false, message: 'expected a string, received NaN' }
    },
    {
      id: 'Number',
      description: 'NaN is not a number',
      run: check(types.number, Number.NaN),
      expected: { ok: false, message: 'expected a number, received NaN' }
    },
    {
      id: 'Integer',
      description: 'fractions are not integers',
      run: check(types.integer, 2.5),
      expected: { ok: false, message: 'expected an integer, received 2.5' }
    },
    {
      id: 'Boolean',
      description: 'strings are not booleans',
      run: check(types.boolean, 'yes'),
      expected: { ok: false, message: 'expected a boolean, received "yes"' }
    },
    {
      id: 'Array Items',
      description: 'item failures name the index',
      run: check(types.array(types.integer), [1, 'x']),
      expected: { ok: false, message: '[1] expected an integer, received "x"' }
    },
    {
      id: 'Array Item Coercion',
      description: 'item coercions are kept',
      run: check(types.array(types.string), [1, 'a']),
      expected: { ok: true, value: ['1', 'a'] }
    },
    {
      id: 'One Of Type',
      description: 'the first accepting member wins',
      run: check(types.oneOfType(types.boolean, types.string), 4),
      expected: { ok: true, value: '4' }
    },
    {
      id: 'One Of Type Failure',
      description: 'failures list every member',
      run: check(types.oneOfType(types.boolean, types.integer), 'x'),
      expected: { ok: false, message: 'expected boolean | integer, received "x"' }
    },
    {
      id: 'Nullable',
      description: 'null is accepted',
      run: check(types.nullable(types.integer), null),
      expected: { ok: true, value: null }
    },
    {
      id: 'Instance Of',
      description: 'instances are checked with instanceof',
      run: check(types.instanceOf(Point), point),
      expected: { ok: true, value: point }
    },
    {
      id: 'Instance Of Failure',
      description: 'other objects are rejected',
      run: check(types.instanceOf(Point), {}),
      expected: { ok: false, message: 'expected an instance of Point, received Object instance' }
    },
    {
      id: 'Node',
      description: 'nested arrays of renderables are nodes',
      run: check(types.node, ['a', [1, null, true]]),
      expected: { ok: true, value: ['a', [1, null, true]] }
    },
    {
      id: 'Node Failure',
      description: 'functions are not nodes',
      run: check(types.node, [() => 'x']),
      expected: { ok: false, message: 'expected a renderable node, received array' }
    },
    {
      id: 'Ref',
      description: 'refs are accepted',
      run: check(types.ref, ref),
      expected: { ok: true, value: ref }
    }
  ];

  test.for(scenarios)('[$id] $description', ({ run, expected }) => {
    expect(run()).toEqual(expected);
  });

  it('names composite types after their members', () => {
    expect(types.array(types.integer).typeName).toBe('array of integer');
    expect(types.nullable(types.string).typeName).toBe('string | null');
  });
});
