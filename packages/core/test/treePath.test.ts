import { describe, expect, it } from 'vitest';
import { Tree } from '../src/entities/Tree.js';
import { NodeNotFoundError, PathNotFoundError } from '../src/errors/tree.js';
import { getSampleTree } from './testUtils.js';

describe('Tree path addressing', () => {
  it('should resolve keys and positions', () => {
    const t = getSampleTree();
    expect(t.getNodeIdByPath('')).toBe('root');
    expect(t.getNodeIdByPath('a')).toBe('a');
    expect(t.getNodeIdByPath('a.b')).toBe('ab');
    expect(t.getNodeIdByPath('a.a.1')).toBe('aa1');
    expect(t.getNodeIdByPath('c.1')).toBe('c1');
  });

  it('should build paths back', () => {
    const t = getSampleTree();
    for (const path of ['a.a', 'a.b', 'a', '', 'a.a.1']) {
      expect(t.getPath(t.getNodeIdByPath(path))).toBe(path);
    }
  });

  it('should use a custom separator', () => {
    const t = getSampleTree('|');
    for (const path of ['a|a', 'a|b', 'a', '', 'a|a|1']) {
      expect(t.getPath(t.getNodeIdByPath(path))).toBe(path);
    }
    expect(() => t.getNodeIdByPath('a.a')).toThrow(PathNotFoundError);
  });

  it('should fail on missing segments', () => {
    const t = getSampleTree();
    expect(() => t.getNodeIdByPath('a.z')).toThrow(PathNotFoundError);
    expect(() => t.getNodeIdByPath('c.5')).toThrow(PathNotFoundError);
    expect(() => t.getNodeIdByPath('c.x')).toThrow(PathNotFoundError);
    expect(() => t.getNodeIdByPath('c.0.deeper')).toThrow(NodeNotFoundError);
    expect(() => new Tree().getNodeIdByPath('')).toThrow(PathNotFoundError);
  });

  it('should report the failing segment', () => {
    const t = getSampleTree();
    try {
      t.getNodeIdByPath('a.z.q');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PathNotFoundError);
      if (error instanceof PathNotFoundError) {
        expect(error.segment).toBe('z');
        expect(error.path).toBe('a.z.q');
        expect(error.message).toBe('Path <a.z.q> can\'t be resolved, no child under <z>');
      }
    }
  });

  it('should fail on unknown ids', () => {
    expect(() => getSampleTree().getPath('nope')).toThrow(NodeNotFoundError);
  });
});
