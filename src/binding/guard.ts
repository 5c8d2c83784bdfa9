import type { SearchStrategy } from '../types.js';
import type { QueryNode } from '../query/node.js';
import type { QueryTree } from '../tree.js';
import { InvalidArgumentError, NotFoundError } from '../errors.js';
import { ArgumentBinder } from './argument-binder.js';
import type { ParameterDescriptor } from './argument-binder.js';

export type DiscoveryMethod = 'get' | 'search';

export interface MatchGuardOptions<F = undefined> {
  /** Signature of the guarded function, in declaration order. */
  parameters: readonly ParameterDescriptor[];
  /** Path (for 'get') or label (for 'search') of the query. Defaults to the root. */
  label?: string;
  /** How the query is found. Defaults to 'get'. */
  discovery?: DiscoveryMethod;
  /** Only used with 'search'. */
  strategy?: SearchStrategy;
  /** Only used with 'search'. */
  begin?: string;
  /** Returned instead of calling the function when the arguments do not match. */
  falseReturnValue?: F;
  /** Run the function when the query cannot be found. Defaults to false. */
  trueIfMissing?: boolean;
  /** Run the function when the arguments do NOT match. Defaults to false. */
  inverse?: boolean;
  /** Called once, when the function is wrapped, if the query cannot be found. */
  onMissing?: (label: string) => void;
}

export type GuardedFunction<A extends unknown[], R, F> = (...args: A) => R | F | undefined;

const DISCOVERY_METHODS: readonly DiscoveryMethod[] = ['get', 'search'];

/**
 * Resolves the guarded query once and returns a wrapper that evaluates the
 * call's arguments against it before deciding whether to call `fn`.
 */
export function guardWithQuery<A extends unknown[], R, F>(
  tree: QueryTree,
  fn: (...args: A) => R,
  options: MatchGuardOptions<F>,
): GuardedFunction<A, R, F> {
  const label = options.label ?? '';
  const binder = new ArgumentBinder(options.parameters);
  const node = discoverNode(tree, label, options);

  if (node === undefined) {
    const onMissing = options.onMissing ?? ((missing: string) => {
      console.warn(`[query-tree] no query found for "${missing}"; guarded calls will ${options.trueIfMissing ? 'run' : 'be skipped'}`);
    });
    onMissing(label);
  }

  const passes = (args: A): boolean => {
    if (node === undefined) return options.trueIfMissing ?? false;
    const matched = node.match(binder.define(args));
    return options.inverse ? !matched : matched;
  };

  return (...args: A): R | F | undefined => {
    if (!passes(args)) return options.falseReturnValue;
    return binder.call(fn, args);
  };
}

function discoverNode<F>(
  tree: QueryTree,
  label: string,
  options: MatchGuardOptions<F>,
): QueryNode | undefined {
  const discovery = options.discovery ?? 'get';
  if (discovery === 'get') {
    try {
      return tree.get(label);
    } catch (err) {
      if (err instanceof NotFoundError) return undefined;
      throw err;
    }
  }
  if (discovery === 'search') {
    return tree.search(label, {
      ...(options.strategy !== undefined ? { strategy: options.strategy } : {}),
      ...(options.begin !== undefined ? { begin: options.begin } : {}),
    });
  }
  throw new InvalidArgumentError(
    'discovery',
    discovery,
    `Discovery method "${String(discovery)}" is not supported. Try ${DISCOVERY_METHODS.map((m) => `"${m}"`).join(' or ')}`,
  );
}
