import type { Definition } from '../types.js';
import { differsFrom } from './equality.js';
import { ASSIGN } from './guards.js';

/** The part of a query node the serializer reads. */
export interface Serializable<N> {
  readonly children: ReadonlyMap<string, N>;
  /** Effective definition of the node. */
  readonly definition: Readonly<Definition>;
}

/**
 * Rebuilds the nested definition for `node` and its descendants.
 *
 * Without deduplication every child carries its full effective definition.
 * With it, a child keeps only the fields it adds or overrides relative to
 * its parent, which is the smallest input that rebuilds the same tree.
 */
export function serializeNode<N extends Serializable<N>>(node: N, deduplicate: boolean): Definition {
  // Effective definitions are frozen; hand back a copy the caller may edit.
  const output: Definition = structuredClone(node.definition);

  for (const [label, child] of node.children) {
    const serialized = serializeNode(child, deduplicate);
    output[label] = { [ASSIGN]: deduplicate ? ownFields(node.definition, serialized) : serialized };
  }
  return output;
}

/**
 * Fields of a child's serialized form that it did not inherit unchanged.
 * Compared against the parent's effective definition, never against the
 * output being assembled, so sibling declarations cannot mask a field.
 */
function ownFields(parent: Readonly<Definition>, child: Definition): Definition {
  const own: Definition = {};
  for (const [key, value] of Object.entries(child)) {
    if (differsFrom(parent, key, value)) own[key] = value;
  }
  return own;
}
