import { Query } from 'mingo';
import type { DataRecord, Definition, Matcher } from './types.js';

/**
 * Matcher backed by mingo's MongoDB query engine.
 *
 * Each definition is compiled on first use and cached against the
 * definition object, so unsupported operators surface when a query is
 * first matched rather than when the tree is built.
 */
export function createMingoMatcher(): Matcher {
  const compiled = new WeakMap<Definition, Query>();
  return {
    matches(definition: Definition, record: DataRecord): boolean {
      let query = compiled.get(definition);
      if (query === undefined) {
        // Definitions are frozen; mingo gets its own copy of the criteria.
        query = new Query(structuredClone(definition));
        compiled.set(definition, query);
      }
      return query.test(record);
    },
  };
}

/** Shared default used when a tree is built without a matcher. */
export const mingoMatcher: Matcher = createMingoMatcher();
