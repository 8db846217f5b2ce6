import type { ValidationConfig } from '../config';
import {
  InvalidPropChoiceError,
  InvalidPropNameError,
  InvalidPropValueError
} from '../errors';
import { isSupplied } from '../sentinels';
import { setOwn } from '../utils/object-utils';
import { isBooleanType, typeNameOf, validateWithSchema } from './schema';
import type { PropSpec } from './spec';
import type { AnyProps, PropTypesTable } from './table';

/** `data-*` and `aria-*` props are accepted on every element type. */
export function isPassthroughPropName(name: string): boolean {
  return name.startsWith('data-') || name.startsWith('aria-');
}

/**
 * Validates the props supplied at instantiation.
 *
 * Contract:
 * - `undefined` and `NotProvided` values count as not supplied and are
 *   dropped, so the default (or "unset") applies.
 * - Undeclared names are rejected in strict mode, and in non-strict mode
 *   unless `rejectUnknownProps` is off (then they are dropped).
 * - Strict mode checks choice membership first, then the declared type
 *   (keeping any coercion the type applies).
 * - Boolean props are normalized in both modes.
 *
 * Required props are NOT checked here: a missing required prop is only an
 * error when it is read.
 *
 * @param tagName Display name used in errors.
 * @returns A new object holding the supplied, validated values.
 */
export function validateProps(
  table: PropTypesTable<object>,
  tagName: string,
  input: Readonly<AnyProps>,
  config: Readonly<ValidationConfig>
): AnyProps {
  const props: AnyProps = {};

  for (const [name, value] of Object.entries(input)) {
    if (!isSupplied(value)) continue;

    if (isPassthroughPropName(name)) {
      setOwn(props, name, value);
      continue;
    }

    const spec = table.get(name);
    if (!spec) {
      if (config.strict || config.rejectUnknownProps) {
        throw new InvalidPropNameError(tagName, name);
      }
      continue;
    }

    setOwn(props, name, validateValue(tagName, name, spec, value, config.strict));
  }

  return props;
}

function validateValue(
  tagName: string,
  name: string,
  spec: PropSpec,
  value: unknown,
  strict: boolean
): unknown {
  // 1. Normalize (both modes)
  const candidate = isBooleanType(spec.type)
    ? normalizeBoolean(name, value, strict)
    : value;

  if (!strict) return candidate;

  // 2. Choices
  if (spec.choices && !spec.choices.some(choice => Object.is(choice, candidate))) {
    throw new InvalidPropChoiceError(tagName, name, candidate, spec.choices);
  }

  // 3. Type (with coercion)
  const outcome = validateWithSchema(spec.type, candidate, `<${tagName}>.${name}`);
  if (!outcome.ok) {
    throw new InvalidPropValueError(
      tagName,
      name,
      value,
      typeNameOf(spec.type),
      outcome.message
    );
  }
  return outcome.value;
}

/**
 * Markup spellings of booleans.
 *
 * `""`, the prop's own name (`checked="checked"`) and `"true"` mean `true`;
 * `"false"` means `false` (any letter case). Other values are left for the
 * type check in strict mode and reduced with `Boolean()` otherwise.
 */
export function normalizeBoolean(
  name: string,
  value: unknown,
  strict: boolean
): unknown {
  if (typeof value === 'boolean') return value;

  if (typeof value === 'string') {
    const lowered = value.toLowerCase();
    if (lowered === '' || lowered === 'true' || lowered === name.toLowerCase()) {
      return true;
    }
    if (lowered === 'false') return false;
  }

  return strict ? value : Boolean(value);
}
