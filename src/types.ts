export type Scalar = string | number | boolean | null;

/**
 * Any value a definition field may hold: a literal, an ordered list, or an
 * operator mapping such as `{ "$lt": 0 }`. Operator mappings are opaque to
 * the tree and only interpreted by a {@link Matcher}.
 */
export type Expression = Scalar | Expression[] | { [key: string]: Expression };

/** Field name → expression, as authored or after inheritance. */
export interface Definition {
  [field: string]: Expression;
}

/** A field value that declares a child query instead of a condition. */
export interface AssignmentBlock {
  $assign: Definition;
}

/** Runtime data classified against a query. */
export type DataRecord = Record<string, unknown>;

export type SearchStrategy = 'depth' | 'breadth';

export interface SearchOptions<D = undefined> {
  /** Returned when no query carries the label. */
  default?: D;
  /** Defaults to 'depth'. */
  strategy?: SearchStrategy;
  /** Dotted path of the query to restart the search from. */
  begin?: string;
}

export interface SerializeOptions {
  /** Omit from each child whatever it inherited unchanged. Defaults to true. */
  deduplicate?: boolean;
}

/**
 * Evaluates an effective definition against a record.
 * Errors thrown here reach the caller unchanged.
 */
export interface Matcher {
  matches(definition: Definition, record: DataRecord): boolean;
}
