/**
 * Error taxonomy.
 *
 * Two families:
 * - Build time: {@link ParseError} (transpiler) and {@link SchemaDefinitionError}
 *   (prop type tables rejected when they are declared).
 * - Render time: {@link ElementError} and its descendants, raised while
 *   elements are instantiated, accessed or rendered, plus {@link RefError}.
 *
 * All errors extend {@link TagweaveError} so callers can catch the whole
 * library with one `instanceof` check.
 */
export class TagweaveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface SourcePosition {
  /** 1-based line in the original source. */
  line: number;
  /** 0-based column in the original source. */
  column: number;
}

/**
 * Raised by the transpiler for malformed markup or host code it cannot scan.
 *
 * The position always refers to the original input, never to generated code.
 */
export class ParseError extends TagweaveError {
  readonly line: number;
  readonly column: number;
  readonly filename: string | undefined;
  readonly reason: string;

  constructor(reason: string, position: SourcePosition, filename?: string) {
    const where = filename ? `${filename}:` : '';
    super(
      `[tagweave] ${reason} (${where}line ${position.line}, column ${position.column})`
    );
    this.reason = reason;
    this.line = position.line;
    this.column = position.column;
    this.filename = filename;
  }
}

/**
 * Raised when a prop type table is declared with conflicting or invalid specs.
 */
export class SchemaDefinitionError extends TagweaveError {
  readonly owner: string;
  readonly propName: string;

  constructor(owner: string, propName: string, reason: string) {
    super(`<${owner}>.${propName}: ${reason}`);
    this.owner = owner;
    this.propName = propName;
  }
}

/** Base class for problems tied to one element type. */
export class ElementError extends TagweaveError {
  readonly tagName: string;

  constructor(tagName: string, message: string) {
    super(`<${tagName}>${message}`);
    this.tagName = tagName;
  }
}

/** Base class for problems tied to one prop of one element type. */
export class PropError extends ElementError {
  readonly propName: string;

  constructor(tagName: string, propName: string, reason: string) {
    super(tagName, `.${propName}: ${reason}`);
    this.propName = propName;
  }
}

/** Reading an optional prop that has neither a value nor a default. */
export class UnsetPropError extends PropError {
  constructor(tagName: string, propName: string) {
    super(tagName, propName, 'prop is not set');
  }
}

/** Reading a required prop that was never supplied. */
export class RequiredPropError extends PropError {
  constructor(tagName: string, propName: string) {
    super(tagName, propName, 'is a required prop but is not set');
  }
}

/** Supplying a prop name the element type does not declare. */
export class InvalidPropNameError extends PropError {
  constructor(tagName: string, propName: string) {
    super(tagName, propName, 'is not an allowed prop');
  }
}

/** Supplying a value that fails the declared type (strict mode only). */
export class InvalidPropValueError extends PropError {
  readonly value: unknown;
  readonly expected: string;

  constructor(
    tagName: string,
    propName: string,
    value: unknown,
    expected: string,
    detail?: string
  ) {
    super(
      tagName,
      propName,
      `${describeValue(value)} is not a valid value for this prop (expected ${expected}${detail ? `: ${detail}` : ''})`
    );
    this.value = value;
    this.expected = expected;
  }
}

/** Supplying a value outside a choice list (strict mode only). */
export class InvalidPropChoiceError extends InvalidPropValueError {
  readonly choices: readonly unknown[];

  constructor(
    tagName: string,
    propName: string,
    value: unknown,
    choices: readonly unknown[]
  ) {
    super(
      tagName,
      propName,
      value,
      `one of ${choices.map(describeValue).join(', ')}`
    );
    this.choices = choices;
  }
}

/** Children of a kind the element type does not accept. */
export class InvalidChildrenError extends ElementError {
  constructor(tagName: string, reason: string) {
    super(tagName, `: ${reason}`);
  }
}

/** Misuse of a {@link Ref}: setting it twice or reading it before it is set. */
export class RefError extends TagweaveError {}

/**
 * Short, stable rendering of a value for error messages.
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'function') {
    return `function ${value.name || '(anonymous)'}`;
  }
  if (typeof value === 'symbol') return value.toString();
  if (typeof value === 'bigint') return `${value}n`;
  if (Array.isArray(value)) return 'array';
  if (value !== null && typeof value === 'object') {
    return value.constructor?.name
      ? `${value.constructor.name} instance`
      : 'object';
  }
  return String(value);
}
