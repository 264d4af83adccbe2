import { describe, expect, it } from 'vitest';
import { Tree } from '../src/entities/Tree.js';
import { TreeNode } from '../src/entities/TreeNode.js';
import { DuplicateNodeError, SchemaValidationError } from '../src/errors/tree.js';
import { SAMPLE_TREE_SHOW, expectSane, getSampleTree } from './testUtils.js';

describe('Tree serialization', () => {
  it('should describe nodes by identifier', () => {
    const t = getSampleTree();
    const data = t.serialize();
    expect(data.root).toBe('root');
    expect(Object.keys(data.nodes)).toHaveLength(9);
    expect(data.parentOf.root).toBeNull();
    expect(data.parentOf.aa0).toBe('aa');
    expect(data.childrenOf.root).toEqual({ a: 'a', c: 'c' });
    expect(data.childrenOf.aa).toEqual(['aa0', 'aa1']);
    expect(data.nodes.aa0).toEqual({
      identifier: 'aa0',
      keyed: true,
      acceptsChildren: true,
      repr: 'AA0',
      data: undefined,
    });
  });

  it('should rebuild the same structure', () => {
    const t = getSampleTree();
    const restored = Tree.deserialize(JSON.parse(JSON.stringify(t.serialize())));
    expectSane(restored);
    expect(restored.show()).toBe(SAMPLE_TREE_SHOW);
    expect(restored.getKey('c1')).toBe(1);
    expect(restored.get('aa')[1].keyed).toBe(false);
  });

  it('should round-trip an empty tree', () => {
    const restored = Tree.deserialize(new Tree().serialize());
    expect(restored.isEmpty()).toBe(true);
  });

  it('should reject malformed input', () => {
    expect(() => Tree.deserialize({ root: 'r' })).toThrow(SchemaValidationError);
    expect(() => Tree.deserialize('tree')).toThrow(SchemaValidationError);
  });

  it('should reject inconsistent references', () => {
    const missing = {
      root: 'r',
      nodes: { r: { identifier: 'r' } },
      parentOf: { r: null },
      childrenOf: { r: { k: 'ghost' } },
    };
    expect(() => Tree.deserialize(missing)).toThrow(SchemaValidationError);

    const wrongParent = {
      root: 'r',
      nodes: { r: { identifier: 'r' }, x: { identifier: 'x' } },
      parentOf: { r: null, x: 'elsewhere' },
      childrenOf: { r: { k: 'x' }, x: {} },
    };
    expect(() => Tree.deserialize(wrongParent)).toThrow(SchemaValidationError);

    const unreachable = {
      root: 'r',
      nodes: { r: { identifier: 'r' }, lost: { identifier: 'lost' } },
      parentOf: { r: null, lost: null },
      childrenOf: { r: {}, lost: {} },
    };
    expect(() => Tree.deserialize(unreachable)).toThrow(SchemaValidationError);
  });

  it('should reject a node listed twice', () => {
    const twice = {
      root: 'r',
      nodes: { r: { identifier: 'r', keyed: false }, x: { identifier: 'x' } },
      parentOf: { r: null, x: 'r' },
      childrenOf: { r: ['x', 'x'], x: {} },
    };
    expect(() => Tree.deserialize(twice)).toThrow(DuplicateNodeError);
  });

  it('should round-trip keys and identifiers named like object members', () => {
    const t = new Tree();
    t.insertNode(new TreeNode('constructor'));
    t.insertNode(new TreeNode('__proto__', { repr: 'P' }), { parentId: 'constructor', key: '__proto__' });
    t.insertNode(new TreeNode('toString', { repr: 'T' }), { parentId: 'constructor', key: 'toString' });

    const data = t.serialize();
    expect(Object.keys(data.nodes)).toEqual(['constructor', '__proto__', 'toString']);
    expect(Object.keys(data.childrenOf.constructor ?? {})).toEqual(['__proto__', 'toString']);

    const restored = Tree.deserialize(JSON.parse(JSON.stringify(data)));
    expectSane(restored);
    expect(restored.size).toBe(3);
    expect(restored.getNodeIdByPath('__proto__')).toBe('__proto__');
    expect(restored.getKey('toString')).toBe('toString');
    expect(restored.show()).toBe(t.show());
  });

  it('should not resolve identifiers to inherited members', () => {
    const inherited = {
      root: 'r',
      nodes: { r: { identifier: 'r' } },
      parentOf: { r: null },
      childrenOf: { r: { k: 'constructor' } },
    };
    expect(() => Tree.deserialize(inherited)).toThrow(SchemaValidationError);
  });

  it('should keep the path separator option', () => {
    const restored = Tree.deserialize(getSampleTree().serialize(), { pathSeparator: '/' });
    expect(restored.getNodeIdByPath('a/a/1')).toBe('aa1');
  });
});
