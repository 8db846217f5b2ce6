import catalogData from './data/html-tags.json';
import { ElementError } from '../errors';
import { types } from '../proptypes/builtins';
import type { PropTypeLike } from '../proptypes/schema';
import { choices, type PropSpec, prop } from '../proptypes/spec';
import { PropTypesTable } from '../proptypes/table';
import {
  isArrayOf,
  isBoolean,
  isObject,
  isOneOf,
  isString
} from '../utils/type-guards';
import type { HtmlElementType } from './types';

/**
 * HTML tag catalog.
 *
 * Pipeline overview:
 * 1. `data/html-tags.json` lists the global attributes and, per tag, the
 *    void flag and the tag's own attributes.
 * 2. The JSON is checked with guards on first use (never at import time).
 * 3. Element types are materialized lazily, one per tag name, and cached.
 *
 * Tag names containing a hyphen are custom elements: they resolve to an
 * open type that accepts any attribute. Other unknown names are rejected.
 */

type AttributeDescriptor =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | { choices: string[] };

interface TagEntry {
  void: boolean;
  attributes: Record<string, AttributeDescriptor>;
}

interface Catalog {
  globalAttributes: Record<string, AttributeDescriptor>;
  tags: Map<string, TagEntry>;
}

const isScalarDescriptor = isOneOf(['string', 'number', 'integer', 'boolean'] as const);
const isChoiceList = isArrayOf(isString);

function isAttributeDescriptor(value: unknown): value is AttributeDescriptor {
  if (isScalarDescriptor(value)) return true;
  return isObject(value) && isChoiceList(value.choices);
}

function readAttributes(
  value: unknown,
  where: string
): Record<string, AttributeDescriptor> {
  if (value === undefined) return {};
  if (!isObject(value)) {
    throw new Error(`[tagweave] HTML catalog: ${where} attributes must be an object`);
  }

  const attributes: Record<string, AttributeDescriptor> = {};
  for (const [name, descriptor] of Object.entries(value)) {
    if (!isAttributeDescriptor(descriptor)) {
      throw new Error(`[tagweave] HTML catalog: invalid descriptor for ${where}.${name}`);
    }
    attributes[name] = descriptor;
  }
  return attributes;
}

function loadCatalog(data: unknown): Catalog {
  if (!isObject(data) || !isObject(data.tags)) {
    throw new Error('[tagweave] HTML catalog: expected { globalAttributes, tags }');
  }

  const tags = new Map<string, TagEntry>();
  for (const [name, entry] of Object.entries(data.tags)) {
    if (!isObject(entry)) {
      throw new Error(`[tagweave] HTML catalog: entry for <${name}> must be an object`);
    }
    const isVoid = entry.void ?? false;
    if (!isBoolean(isVoid)) {
      throw new Error(`[tagweave] HTML catalog: <${name}>.void must be a boolean`);
    }
    tags.set(name, { void: isVoid, attributes: readAttributes(entry.attributes, name) });
  }

  return {
    globalAttributes: readAttributes(data.globalAttributes, 'global'),
    tags
  };
}

const SCALAR_TYPES: Record<Exclude<AttributeDescriptor, object>, PropTypeLike> = {
  string: types.string,
  number: types.number,
  integer: types.integer,
  boolean: types.boolean
};

function toSpec(descriptor: AttributeDescriptor): PropSpec {
  if (typeof descriptor === 'string') return prop(SCALAR_TYPES[descriptor]);
  return choices(descriptor.choices, { type: types.string });
}

let catalog: Catalog | undefined;
let globalSpecs: ReadonlyMap<string, PropSpec> | undefined;
const resolved = new Map<string, HtmlElementType>();

function getCatalog(): Catalog {
  catalog ??= loadCatalog(catalogData);
  return catalog;
}

function getGlobalSpecs(): ReadonlyMap<string, PropSpec> {
  globalSpecs ??= new Map(
    Object.entries(getCatalog().globalAttributes).map(
      ([name, descriptor]) => [name, toSpec(descriptor)] as const
    )
  );
  return globalSpecs;
}

/** Whether `name` is a custom element name (contains a hyphen). */
export function isCustomElementName(name: string): boolean {
  return name.includes('-');
}

/** Whether `name` is a known HTML tag. */
export function isKnownTag(name: string): boolean {
  return getCatalog().tags.has(name);
}

/** Whether `name` is a void tag (`br`, `img`, ...). */
export function isVoidTag(name: string): boolean {
  return getCatalog().tags.get(name)?.void ?? false;
}

/**
 * Resolves a lowercase tag name to its element type.
 *
 * @throws {ElementError} For names that are neither known tags nor custom
 *   element names.
 */
export function resolveHtmlTag(name: string): HtmlElementType {
  const cached = resolved.get(name);
  if (cached) return cached;

  const entry = getCatalog().tags.get(name);
  let type: HtmlElementType;

  if (entry) {
    const specs = new Map(getGlobalSpecs());
    for (const [attribute, descriptor] of Object.entries(entry.attributes)) {
      specs.set(attribute, toSpec(descriptor));
    }
    type = {
      kind: 'html',
      name,
      tag: name,
      isVoid: entry.void,
      open: false,
      acceptsChildren: !entry.void,
      propTypes: new PropTypesTable(name, specs)
    };
  } else if (isCustomElementName(name)) {
    type = {
      kind: 'html',
      name,
      tag: name,
      isVoid: false,
      open: true,
      acceptsChildren: true,
      propTypes: new PropTypesTable(name, getGlobalSpecs())
    };
  } else {
    throw new ElementError(name, ' is not a known HTML tag');
  }

  Object.freeze(type);
  resolved.set(name, type);
  return type;
}
