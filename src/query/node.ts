import type { DataRecord, Definition, Matcher, SearchOptions, SerializeOptions } from '../types.js';
import { ROOT_LABEL, deepFreeze, toDefinition } from './guards.js';
import { resolveInheritance, splitDefinition } from './inheritance.js';
import { PATH_DELIMITER, getByPath, searchTree } from './locator.js';
import { serializeNode } from './serializer.js';

export interface QueryNodeInit {
  label?: string;
  parent?: QueryNode | null;
  matcher: Matcher;
}

/**
 * A labeled query in the tree.
 *
 * Construction is eager: the node inherits its parent's effective
 * definition, then builds every child declared in its raw definition, so a
 * root node returns fully built. Nodes never change afterwards.
 */
export class QueryNode {
  readonly label: string;
  readonly parent: QueryNode | null;
  /** Definition as authored, child declarations included. */
  readonly rawDefinition: Readonly<Definition>;
  /** Definition evaluated against records: inherited, with child declarations removed. */
  readonly definition: Readonly<Definition>;
  readonly children: ReadonlyMap<string, QueryNode>;

  private readonly matcher: Matcher;

  constructor(definition: Definition, init: QueryNodeInit) {
    this.label = init.label ?? ROOT_LABEL;
    this.parent = init.parent ?? null;
    this.matcher = init.matcher;
    this.rawDefinition = deepFreeze(toDefinition(definition, this.path));

    const working = resolveInheritance(this.rawDefinition, this.parent?.definition ?? null);
    const split = splitDefinition(this.rawDefinition, working, this.path);
    this.definition = Object.freeze(split.definition);

    const children = new Map<string, QueryNode>();
    for (const declaration of split.children) {
      children.set(
        declaration.label,
        new QueryNode(declaration.definition, {
          label: declaration.label,
          parent: this,
          matcher: this.matcher,
        }),
      );
    }
    this.children = children;
  }

  /** Queries this one inherits from, root first, ending with itself. */
  get inheritance(): QueryNode[] {
    return [...(this.parent?.inheritance ?? []), this];
  }

  /** Dotted path that {@link QueryNode.get} resolves from the root to this node. */
  get path(): string {
    return this.inheritance
      .slice(1)
      .map((node) => node.label)
      .join(PATH_DELIMITER);
  }

  /** Direct child with the given label. */
  child(label: string): QueryNode | undefined {
    return this.children.get(label);
  }

  /**
   * Retrieves the query at a dotted path of labels below this node. Do not
   * include this node's own label in the path.
   *
   * @throws NotFoundError when a segment of a dotted path does not exist
   */
  get(path: string): QueryNode | undefined {
    return getByPath<QueryNode>(this, path);
  }

  /**
   * Finds the first query labeled `label`, depth-first unless told otherwise.
   *
   * @throws InvalidArgumentError for an unknown strategy
   * @throws NotFoundError when `begin` does not resolve
   */
  search(label: string, options?: SearchOptions): QueryNode | undefined;
  search<D>(label: string, options: SearchOptions<D> & { default: D }): QueryNode | D;
  search<D>(label: string, options: SearchOptions<D> = {}): QueryNode | D | undefined {
    return searchTree<QueryNode, D>(this, label, options);
  }

  serialize(options: SerializeOptions = {}): Definition {
    return serializeNode<QueryNode>(this, options.deduplicate ?? true);
  }

  match(record: DataRecord): boolean {
    return this.matcher.matches(this.definition, record);
  }

  toJSON(): Definition {
    return this.serialize();
  }

  toString(): string {
    return `<QueryNode ${this.inheritance.map((node) => node.label).join(PATH_DELIMITER)}>`;
  }
}
