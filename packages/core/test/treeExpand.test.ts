import { describe, expect, it } from 'vitest';
import { type ExpandOptions, type SortKey, type TraversalMode, Tree } from '../src/entities/Tree.js';
import type { TreeNode } from '../src/entities/TreeNode.js';
import { InvalidArgumentError, NodeNotFoundError } from '../src/errors/tree.js';
import { getSampleTree, toKeyIds } from './testUtils.js';

describe('Tree traversal', () => {
  describe('depth mode', () => {
    it('should walk in pre-order with siblings sorted by key', () => {
      const t = getSampleTree();
      expect(toKeyIds(t.expand())).toEqual([
        [null, 'root'],
        ['a', 'a'],
        ['a', 'aa'],
        [0, 'aa0'],
        [1, 'aa1'],
        ['b', 'ab'],
        ['c', 'c'],
        [0, 'c0'],
        [1, 'c1'],
      ]);
    });

    it('should reverse sibling order', () => {
      const t = getSampleTree();
      expect(toKeyIds(t.expand(null, { reverse: true }))).toEqual([
        [null, 'root'],
        ['c', 'c'],
        [1, 'c1'],
        [0, 'c0'],
        ['a', 'a'],
        ['b', 'ab'],
        ['a', 'aa'],
        [1, 'aa1'],
        [0, 'aa0'],
      ]);
    });

    it('should walk a subtree', () => {
      const t = getSampleTree();
      expect(toKeyIds(t.expand('a'))).toEqual([
        ['a', 'a'],
        ['a', 'aa'],
        [0, 'aa0'],
        [1, 'aa1'],
        ['b', 'ab'],
      ]);
    });
  });

  describe('width mode', () => {
    it('should walk level by level', () => {
      const t = getSampleTree();
      expect(toKeyIds(t.expand(null, { mode: 'width' }))).toEqual([
        [null, 'root'],
        ['a', 'a'],
        ['c', 'c'],
        ['a', 'aa'],
        ['b', 'ab'],
        [0, 'c0'],
        [1, 'c1'],
        [0, 'aa0'],
        [1, 'aa1'],
      ]);
    });

    it('should reverse sibling order', () => {
      const t = getSampleTree();
      expect(toKeyIds(t.expand(null, { mode: 'width', reverse: true }))).toEqual([
        [null, 'root'],
        ['c', 'c'],
        ['a', 'a'],
        [1, 'c1'],
        [0, 'c0'],
        ['b', 'ab'],
        ['a', 'aa'],
        [1, 'aa1'],
        [0, 'aa0'],
      ]);
    });

    it('should walk a subtree', () => {
      const t = getSampleTree();
      expect(toKeyIds(t.expand('a', { mode: 'width' }))).toEqual([
        ['a', 'a'],
        ['a', 'aa'],
        ['b', 'ab'],
        [0, 'aa0'],
        [1, 'aa1'],
      ]);
    });
  });

  describe('filtering', () => {
    it('should prune filtered nodes with their descendants', () => {
      const t = getSampleTree();
      expect(
        toKeyIds(t.expand(null, { filter: (_key, node) => ['root', 'c'].includes(node.identifier) }))
      ).toEqual([
        [null, 'root'],
        ['c', 'c'],
      ]);
      expect(toKeyIds(t.expand(null, { filter: (_key, node) => node.identifier.includes('1') }))).toEqual(
        []
      );
    });

    it('should keep walking below filtered nodes with filterThrough', () => {
      const t = getSampleTree();
      expect(
        toKeyIds(
          t.expand(null, {
            filter: (_key, node) => node.identifier.includes('1'),
            filterThrough: true,
          })
        )
      ).toEqual([
        [1, 'aa1'],
        [1, 'c1'],
      ]);
    });
  });

  it('should order siblings with a custom sort key', () => {
    const t = getSampleTree();
    const byRepr: SortKey<TreeNode> = (_key, node) => node.repr ?? node.identifier;
    expect(toKeyIds(t.expand('c', { sortKey: byRepr, reverse: true }))).toEqual([
      ['c', 'c'],
      [1, 'c1'],
      [0, 'c0'],
    ]);
  });

  it('should visit every node exactly once', () => {
    const t = getSampleTree();
    const modes: TraversalMode[] = ['depth', 'width'];
    for (const mode of modes) {
      const ids = toKeyIds(t.expand(null, { mode })).map(([, id]) => id);
      expect(ids).toHaveLength(t.size);
      expect(new Set(ids)).toEqual(new Set(t.list().map(([, node]) => node.identifier)));
    }
  });

  it('should yield nothing for an empty tree', () => {
    expect([...new Tree().expand()]).toEqual([]);
  });

  it('should validate arguments before iterating', () => {
    const t = getSampleTree();
    const sideways: ExpandOptions<TreeNode> = JSON.parse('{"mode":"sideways"}');
    expect(() => t.expand(null, sideways)).toThrow(InvalidArgumentError);
    expect(() => t.expand('nope')).toThrow(NodeNotFoundError);
  });
});
