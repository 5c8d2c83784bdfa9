import type { Definition, Expression } from '../types.js';

/**
 * Result of reading a field. Presence is carried separately from the value
 * so that a field holding `null` is never mistaken for a missing one.
 */
export type FieldLookup =
  | { present: true; value: Expression }
  | { present: false };

export function lookupField(definition: Readonly<Definition>, key: string): FieldLookup {
  const value = Object.prototype.hasOwnProperty.call(definition, key) ? definition[key] : undefined;
  return value === undefined ? { present: false } : { present: true, value };
}

/**
 * Structural equality over expressions.
 *
 * Arrays compare element by element in order; mappings compare by key set
 * and per-key value, ignoring key order.
 */
export function expressionsEqual(a: Expression, b: Expression): boolean {
  if (a === b) return true;
  if (a === null || b === null || typeof a !== 'object' || typeof b !== 'object') return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => {
      const other = b[index];
      return other !== undefined && expressionsEqual(item, other);
    });
  }

  const entries = Object.entries(a);
  if (entries.length !== Object.keys(b).length) return false;
  return entries.every(([key, value]) => {
    const other = lookupField(b, key);
    return other.present && expressionsEqual(value, other.value);
  });
}

/**
 * True when `key` is missing from `definition` or holds a different value.
 */
export function differsFrom(definition: Readonly<Definition>, key: string, value: Expression): boolean {
  const current = lookupField(definition, key);
  return !current.present || !expressionsEqual(current.value, value);
}
