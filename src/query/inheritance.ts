import type { Definition } from '../types.js';
import { MalformedDefinitionError } from '../errors.js';
import { hasAssignment, isAssignmentBlock, isIndexLike, readAssignment } from './guards.js';

/** A child query found inside a raw definition, not yet constructed. */
export interface ChildDeclaration {
  label: string;
  definition: Definition;
}

export interface SplitDefinition {
  /** Working definition with every child declaration removed. */
  definition: Definition;
  /** Declarations in the order they appear in the raw definition. */
  children: ChildDeclaration[];
}

/**
 * Merges a parent's effective definition under a node's raw definition.
 *
 * Every inherited field is kept except assignment blocks, which belong to
 * the parent's own children. Fields the node defines itself replace the
 * inherited value, whatever either value looks like. Inherited fields keep
 * their position; new fields follow in raw order.
 */
export function resolveInheritance(
  raw: Readonly<Definition>,
  inherited: Readonly<Definition> | null,
): Definition {
  const working: Definition = {};
  if (inherited !== null) {
    for (const [key, value] of Object.entries(inherited)) {
      if (!isAssignmentBlock(value)) working[key] = value;
    }
  }
  return Object.assign(working, raw);
}

/**
 * Pulls child declarations out of a working definition.
 *
 * Declarations are detected on the raw definition, so an inherited field
 * that a child label shadows is dropped along with the declaration.
 * Integer-like labels are rejected: objects enumerate them first.
 *
 * @param path - dotted path of the node being built, used in error messages
 */
export function splitDefinition(
  raw: Readonly<Definition>,
  working: Readonly<Definition>,
  path: string,
): SplitDefinition {
  const children: ChildDeclaration[] = [];
  const extracted = new Set<string>();

  for (const [label, value] of Object.entries(raw)) {
    if (!hasAssignment(value)) continue;
    const childPath = path === '' ? label : `${path}.${label}`;
    if (isIndexLike(label)) {
      throw new MalformedDefinitionError(
        childPath,
        `child label "${label}" is integer-like and would not keep its declared order`,
      );
    }
    children.push({ label, definition: readAssignment(value, childPath) });
    extracted.add(label);
  }

  const definition: Definition = {};
  for (const [key, value] of Object.entries(working)) {
    if (!extracted.has(key)) definition[key] = value;
  }
  return { definition, children };
}
