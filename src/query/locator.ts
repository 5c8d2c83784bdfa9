import type { SearchOptions, SearchStrategy } from '../types.js';
import { InvalidArgumentError, NotFoundError } from '../errors.js';

export const PATH_DELIMITER = '.';

const STRATEGIES: readonly SearchStrategy[] = ['depth', 'breadth'];

/** The part of a query node the locator walks. */
export interface Locatable<N> {
  readonly label: string;
  readonly children: ReadonlyMap<string, N>;
}

/**
 * Exact lookup relative to `node`.
 *
 * - `''` or the node's own label returns the node.
 * - A dotted path resolves one direct child per segment and throws
 *   NotFoundError at the first segment that does not exist.
 * - A single label that is not a direct child returns undefined.
 */
export function getByPath<N extends Locatable<N>>(node: N, path: string): N | undefined {
  if (path === '' || path === node.label) return node;
  if (!path.includes(PATH_DELIMITER)) return node.children.get(path);

  let current = node;
  for (const segment of path.split(PATH_DELIMITER)) {
    const next = current.children.get(segment);
    if (next === undefined) throw new NotFoundError(path, segment);
    current = next;
  }
  return current;
}

/**
 * Finds the first node labeled `label` below `node`.
 *
 * Reused labels shadow each other: only the first one the strategy visits
 * is reachable, unless `begin` narrows the starting point. Exhausting the
 * tree returns `options.default`.
 */
export function searchTree<N extends Locatable<N>, D>(
  node: N,
  label: string,
  options: SearchOptions<D> = {},
): N | D | undefined {
  if (options.begin !== undefined) {
    const start = getByPath(node, options.begin);
    if (start === undefined) throw new NotFoundError(options.begin, options.begin);
    return searchTree(start, label, { ...options, begin: undefined });
  }
  if (label === '' || label === node.label) return node;

  const strategy = options.strategy ?? 'depth';
  let found: N | undefined;
  if (strategy === 'depth') {
    found = searchDepthFirst(node, label);
  } else if (strategy === 'breadth') {
    found = searchBreadthFirst(node, label);
  } else {
    throw new InvalidArgumentError(
      'strategy',
      strategy,
      `Search strategy "${String(strategy)}" is not supported. Try ${STRATEGIES.map((s) => `"${s}"`).join(' or ')}`,
    );
  }
  return found ?? options.default;
}

/**
 * Pre-order walk: each child is checked, then its subtree is exhausted
 * before the next sibling.
 */
export function searchDepthFirst<N extends Locatable<N>>(node: N, label: string): N | undefined {
  for (const child of node.children.values()) {
    if (child.label === label) return child;
    const found = searchDepthFirst(child, label);
    if (found !== undefined) return found;
  }
  return undefined;
}

/**
 * Level-order walk over children maps: a whole level is checked before any
 * grandchildren.
 */
export function searchBreadthFirst<N extends Locatable<N>>(node: N, label: string): N | undefined {
  const queue: ReadonlyMap<string, N>[] = [node.children];
  while (queue.length > 0) {
    const level = queue.shift();
    if (level === undefined) break;
    const found = level.get(label);
    if (found !== undefined) return found;
    for (const child of level.values()) {
      queue.push(child.children);
    }
  }
  return undefined;
}
