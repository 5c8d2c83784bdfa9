import type { AssignmentBlock, Definition, Expression } from '../types.js';
import { MalformedDefinitionError } from '../errors.js';

/** Reserved key that turns a field value into a child query declaration. */
export const ASSIGN = '$assign';

/** Label of the implicit root query. */
export const ROOT_LABEL = '#root';

// Assigning this key sets the prototype instead of a field.
const PROTO_KEY = '__proto__';

const MAX_ARRAY_INDEX = 2 ** 32 - 2;

/**
 * True for keys that objects enumerate in numeric order ahead of every
 * other key, whatever order they were written in.
 */
export function isIndexLike(key: string): boolean {
  return /^(0|[1-9]\d*)$/.test(key) && Number(key) <= MAX_ARRAY_INDEX;
}

/**
 * True for `{}`-style objects: not arrays, not null, not class instances.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * True when the value is a mapping carrying the assignment marker.
 * Does not check the payload; see {@link readAssignment}.
 */
export function hasAssignment(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value) && Object.prototype.hasOwnProperty.call(value, ASSIGN);
}

export function isAssignmentBlock(value: unknown): value is AssignmentBlock {
  return hasAssignment(value) && isPlainObject(value[ASSIGN]);
}

/**
 * Returns the child definition declared by an assignment block.
 * Throws when the marker shares its mapping with other keys or its payload
 * is not a mapping.
 */
export function readAssignment(value: Record<string, unknown>, path: string): Definition {
  const extra = Object.keys(value).filter((key) => key !== ASSIGN);
  if (extra.length > 0) {
    throw new MalformedDefinitionError(
      path,
      `"${ASSIGN}" cannot be combined with other keys (${extra.join(', ')})`,
    );
  }
  return toDefinition(value[ASSIGN], path);
}

/**
 * Validates an untyped value (e.g. parsed JSON) as an expression.
 */
export function toExpression(value: unknown, path: string): Expression {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new MalformedDefinitionError(path, `non-finite number ${String(value)}`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toExpression(item, `${path}[${index}]`));
  }
  if (isPlainObject(value)) {
    return toDefinition(value, path);
  }
  throw new MalformedDefinitionError(path, `unsupported value of type ${typeof value}`);
}

/**
 * Validates an untyped value as a definition mapping.
 */
export function toDefinition(value: unknown, path: string): Definition {
  if (!isPlainObject(value)) {
    const kind = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value;
    throw new MalformedDefinitionError(path, `expected a mapping, got ${kind}`);
  }
  const definition: Definition = {};
  for (const [key, item] of Object.entries(value)) {
    const fieldPath = path === '' ? key : `${path}.${key}`;
    if (key === PROTO_KEY) {
      throw new MalformedDefinitionError(fieldPath, `field name "${PROTO_KEY}" is not allowed`);
    }
    definition[key] = toExpression(item, fieldPath);
  }
  return definition;
}

/**
 * Freezes an expression and everything nested inside it.
 */
export function deepFreeze<T extends Expression>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
    Object.freeze(value);
  }
  return value;
}
