import { describe, expect, it } from 'vitest';
import { JsonTree } from '../src/entities/JsonTree.js';
import { InvalidArgumentError } from '../src/errors/tree.js';

const SAMPLE = { a: [{}, { b: 12 }, [1, 2, 3]] };

describe('JsonTree', () => {
  it('should render a JSON value', () => {
    const j = new JsonTree(SAMPLE);
    expect(j.toString()).toBe(`{}
└── a: []
    ├── {}
    ├── {}
    │   └── b: 12
    └── []
        ├── 1
        ├── 2
        └── 3
`);
  });

  it('should convert back to JSON', () => {
    const value = { name: 'n', flags: [true, false, null], nested: { depth: 2, list: [] } };
    expect(new JsonTree(value).toJson()).toEqual(value);
    expect(new JsonTree(SAMPLE).toJson()).toEqual(SAMPLE);
  });

  it('should convert a part of the tree', () => {
    const j = new JsonTree(SAMPLE);
    expect(j.toJson(j.getNodeIdByPath('a.1'))).toEqual({ b: 12 });
    expect(j.toJson(j.getNodeIdByPath('a.2.0'))).toBe(1);
  });

  it('should accept scalars as root', () => {
    expect(new JsonTree('text').toJson()).toBe('text');
    expect(new JsonTree(null).toJson()).toBeNull();
    expect(new JsonTree(null).show()).toBe('null\n');
  });

  it('should start empty without a value', () => {
    const j = new JsonTree();
    expect(j.isEmpty()).toBe(true);
    expect(j.toJson()).toBeUndefined();
  });

  it('should refuse non-JSON values', () => {
    expect(() => new JsonTree({ fn: () => 1 })).toThrow(InvalidArgumentError);
    expect(() => new JsonTree([undefined])).toThrow(InvalidArgumentError);
    expect(() => new JsonTree(new Date(0))).toThrow(InvalidArgumentError);
  });

  it('should keep its class through clones and subtrees', () => {
    const j = new JsonTree(SAMPLE, { pathSeparator: '/' });
    const copy = j.clone();
    expect(copy).toBeInstanceOf(JsonTree);
    expect(copy.pathSeparator).toBe('/');
    const [key, sub] = j.subtree(j.getNodeIdByPath('a/1'));
    expect(key).toBe(1);
    expect(sub).toBeInstanceOf(JsonTree);
    expect(sub.toJson()).toEqual({ b: 12 });
    expect(copy.toJson()).toEqual(SAMPLE);
  });

  it('should keep "__proto__" as a plain key', () => {
    const value: unknown = JSON.parse('{"__proto__": 1, "b": 2}');
    const j = new JsonTree(value);
    const json = j.toJson();
    expect(Object.getPrototypeOf(json)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(json, '__proto__')?.value).toBe(1);
    expect(Object.keys(json ?? {})).toEqual(['__proto__', 'b']);
    expect(j.get(j.getNodeIdByPath('__proto__'))[1].data).toBe(1);
  });
});
