import { describe, it, expect } from 'vitest';
import { QueryNode } from '../../src/query/node.js';
import type { Definition, Matcher } from '../../src/types.js';

const neverMatcher: Matcher = { matches: () => false };

function build(definition: Definition): QueryNode {
  return new QueryNode(definition, { matcher: neverMatcher });
}

/** Effective definition of every node, keyed by path. */
function effectiveByPath(node: QueryNode): Map<string, unknown> {
  const out = new Map<string, unknown>([[node.path, node.definition]]);
  for (const child of node.children.values()) {
    for (const [path, definition] of effectiveByPath(child)) out.set(path, definition);
  }
  return out;
}

const CASE: Definition = {
  a: 0,
  b: { $lt: 0 },
  cCheck: { $assign: {
    c: 0,
    cCheckPosB: { $assign: { b: { $gt: 0 } } },
  } },
  dCheck: { $assign: { d: 0 } },
};

describe('serialize()', () => {
  const q = build(CASE);

  it('writes full inherited definitions without deduplication', () => {
    expect(q.serialize({ deduplicate: false })).toEqual({
      a: 0,
      b: { $lt: 0 },
      cCheck: { $assign: {
        a: 0,
        b: { $lt: 0 },
        c: 0,
        cCheckPosB: { $assign: {
          a: 0,
          c: 0,
          b: { $gt: 0 },
        } },
      } },
      dCheck: { $assign: {
        a: 0,
        b: { $lt: 0 },
        d: 0,
      } },
    });
  });

  it('reproduces the authored input with deduplication', () => {
    expect(q.serialize({ deduplicate: true })).toEqual(CASE);
  });

  it('deduplicates by default', () => {
    expect(q.serialize()).toEqual(CASE);
    expect(q.toJSON()).toEqual(CASE);
  });

  it('serializes a subtree from any node', () => {
    expect(q.get('cCheck')?.serialize()).toEqual({
      a: 0,
      b: { $lt: 0 },
      c: 0,
      cCheckPosB: { $assign: { b: { $gt: 0 } } },
    });
  });

  it('returns a copy the caller may change', () => {
    const output = q.serialize();
    output['a'] = 1;
    const b = output['b'];
    if (b !== null && typeof b === 'object' && !Array.isArray(b)) b['$lt'] = 5;
    expect(q.definition).toEqual({ a: 0, b: { $lt: 0 } });
  });

  it('drops a field a child repeats with the same value', () => {
    const tree = build({ a: 0, child: { $assign: { a: 0, b: 1 } } });
    expect(tree.serialize()).toEqual({ a: 0, child: { $assign: { b: 1 } } });
  });

  it('keeps a child override whose value is structurally different', () => {
    const tree = build({
      a: { $in: [1, 2] },
      child: { $assign: { a: { $in: [2, 1] } } },
    });
    expect(tree.serialize()).toEqual({
      a: { $in: [1, 2] },
      child: { $assign: { a: { $in: [2, 1] } } },
    });
  });

  it('treats an operator mapping with reordered keys as unchanged', () => {
    const tree = build({
      a: { $gt: 0, $lt: 9 },
      child: { $assign: { a: { $lt: 9, $gt: 0 } } },
    });
    expect(tree.serialize()).toEqual({ a: { $gt: 0, $lt: 9 }, child: { $assign: {} } });
  });

  it('keeps a child field holding null when the parent lacks it', () => {
    const tree = build({ a: 0, child: { $assign: { n: null } } });
    expect(tree.serialize()).toEqual({ a: 0, child: { $assign: { n: null } } });
  });

  it('drops a child null that matches a parent null', () => {
    const tree = build({ n: null, child: { $assign: { n: null, m: 1 } } });
    expect(tree.serialize()).toEqual({ n: null, child: { $assign: { m: 1 } } });
  });

  it('keeps an override of null by a value and of a value by null', () => {
    const tree = build({
      n: null,
      v: 1,
      child: { $assign: { n: 0, v: null } },
    });
    expect(tree.serialize()).toEqual({ n: null, v: 1, child: { $assign: { n: 0, v: null } } });
  });

  it('compares against the parent, not against sibling declarations', () => {
    const tree = build({
      first: { $assign: { x: 1 } },
      second: { $assign: { first: { $assign: { x: 1 } } } },
    });
    expect(tree.serialize()).toEqual({
      first: { $assign: { x: 1 } },
      second: { $assign: { first: { $assign: { x: 1 } } } },
    });
  });
});

describe('serialize() round trip', () => {
  const cases: Array<[string, Definition]> = [
    ['nested overrides', CASE],
    ['duplicate labels', {
      a: 0,
      b: { $lt: 0 },
      cCheck: { $assign: { c: 0, dCheck: { $assign: { d: 0 } } } },
      dCheck: { $assign: { d: 0 } },
    }],
    ['verbose children', {
      a: 0,
      kid: { $assign: { a: 0, b: 1, grand: { $assign: { a: 0, b: 1, c: [1, { x: null }] } } } },
    }],
    ['shadowed field', {
      x: 1,
      child: { $assign: { x: { $assign: { y: 2 } } } },
    }],
    ['logical combinators', {
      $or: [{ a: 1 }, { b: { $gte: 2 } }],
      child: { $assign: { $or: [{ a: 2 }], z: { $not: { $eq: 0 } } } },
    }],
  ];

  it.each(cases)('rebuilds identical effective definitions: %s', (_name, definition) => {
    const original = build(definition);
    const rebuilt = build(original.serialize({ deduplicate: true }));
    expect(effectiveByPath(rebuilt)).toEqual(effectiveByPath(original));
  });

  it.each(cases)('deduplicated output is stable once normalized: %s', (_name, definition) => {
    const once = build(definition).serialize();
    expect(build(once).serialize()).toEqual(once);
  });

  it.each(cases)('plain output also rebuilds the same tree: %s', (_name, definition) => {
    const original = build(definition);
    const rebuilt = build(original.serialize({ deduplicate: false }));
    expect(effectiveByPath(rebuilt)).toEqual(effectiveByPath(original));
  });
});
