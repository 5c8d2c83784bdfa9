import { readFile } from 'node:fs/promises';
import type { DataRecord, Definition, Matcher, SearchOptions, SerializeOptions } from './types.js';
import { MalformedDefinitionError, NotFoundError } from './errors.js';
import { mingoMatcher } from './matcher.js';
import { QueryNode } from './query/node.js';
import { toDefinition } from './query/guards.js';
import { searchTree } from './query/locator.js';
import { guardWithQuery } from './binding/guard.js';
import type { GuardedFunction, MatchGuardOptions } from './binding/guard.js';

export interface QueryTreeConfig {
  /** Evaluates effective definitions. Defaults to the mingo-backed matcher. */
  matcher?: Matcher;
}

export interface ParseOptions extends QueryTreeConfig {
  /** Passed through to JSON.parse. */
  reviver?: (this: unknown, key: string, value: unknown) => unknown;
}

export interface ReadFileOptions extends ParseOptions {
  encoding?: BufferEncoding;
}

/**
 * A hierarchy of labeled queries where children inherit, and may override,
 * their parent's conditions.
 *
 * @example
 * const tree = QueryTree.fromDefinition({
 *   a: 0,
 *   b: { $lt: 0 },
 *   withC: { $assign: { c: 0 } },
 * });
 * tree.get('withC')?.definition; // { a: 0, b: { $lt: 0 }, c: 0 }
 * tree.match({ a: 0, b: -1 });    // true
 */
export class QueryTree {
  readonly root: QueryNode;

  private constructor(root: QueryNode) {
    this.root = root;
  }

  /**
   * Builds a tree from a nested definition. The input is validated and
   * copied; later changes to it do not reach the tree.
   *
   * @throws MalformedDefinitionError when the definition or any assignment block is invalid
   */
  static fromDefinition(definition: Definition, config: QueryTreeConfig = {}): QueryTree {
    return QueryTree.build(definition, config);
  }

  /**
   * Builds a tree from JSON text or UTF-8 encoded JSON bytes.
   */
  static fromString(text: string | Uint8Array, options: ParseOptions = {}): QueryTree {
    const source = typeof text === 'string' ? text : new TextDecoder().decode(text);
    let parsed: unknown;
    try {
      parsed = JSON.parse(source, options.reviver);
    } catch (err) {
      throw new MalformedDefinitionError('', `invalid JSON: ${String(err)}`, err);
    }
    return QueryTree.build(parsed, options);
  }

  /**
   * Reads a JSON document from disk and builds a tree from it. The file is
   * read completely before construction starts.
   */
  static async fromFile(path: string, options: ReadFileOptions = {}): Promise<QueryTree> {
    const text = await readFile(path, { encoding: options.encoding ?? 'utf8' });
    return QueryTree.fromString(text, options);
  }

  private static build(definition: unknown, config: QueryTreeConfig): QueryTree {
    const root = new QueryNode(toDefinition(definition, ''), {
      matcher: config.matcher ?? mingoMatcher,
    });
    return new QueryTree(root);
  }

  /** See {@link QueryNode.get}. */
  get(path: string): QueryNode | undefined {
    return this.root.get(path);
  }

  /** See {@link QueryNode.search}. */
  search(label: string, options?: SearchOptions): QueryNode | undefined;
  search<D>(label: string, options: SearchOptions<D> & { default: D }): QueryNode | D;
  search<D>(label: string, options: SearchOptions<D> = {}): QueryNode | D | undefined {
    return searchTree<QueryNode, D>(this.root, label, options);
  }

  serialize(options: SerializeOptions = {}): Definition {
    return this.root.serialize(options);
  }

  /**
   * Matches a record against the query at `path` (the root by default).
   *
   * @throws NotFoundError when no query exists at `path`
   */
  match(record: DataRecord, path = ''): boolean {
    const node = this.root.get(path);
    if (node === undefined) throw new NotFoundError(path, path);
    return node.match(record);
  }

  /**
   * Wraps a function so it only runs when its arguments match a query.
   *
   * @example
   * const add = tree.onMatch({ parameters: [positional('a'), positional('b')] })(
   *   (a: number, b: number) => a + b,
   * );
   */
  onMatch<F = undefined>(
    options: MatchGuardOptions<F>,
  ): <A extends unknown[], R>(fn: (...args: A) => R) => GuardedFunction<A, R, F> {
    return <A extends unknown[], R>(fn: (...args: A) => R): GuardedFunction<A, R, F> =>
      guardWithQuery(this, fn, options);
  }

  toJSON(): Definition {
    return this.serialize();
  }

  toString(): string {
    return this.root.toString();
  }
}
