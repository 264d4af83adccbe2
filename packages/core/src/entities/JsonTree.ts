import { InvalidArgumentError } from '../errors/tree.js';
import { type CloneOptions, type SubtreeOptions, Tree, type TreeOptions } from './Tree.js';
import type { NodeKey } from './TreeIndex.js';
import { TreeNode } from './TreeNode.js';

export type JsonScalar = string | number | boolean | null;
export type JsonValue = JsonScalar | JsonValue[] | { [key: string]: JsonValue };

export type JsonNode = TreeNode<JsonScalar>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Tree built from a JSON-like value: objects become keyed nodes, arrays list
 * nodes, scalars leaves carrying the value.
 *
 * ```ts
 * new JsonTree({ a: [{}, { b: 12 }, [1, 2, 3]] }).show();
 * ```
 */
export class JsonTree extends Tree<JsonNode> {
  constructor(value?: unknown, options: TreeOptions = {}) {
    super(options);
    if (value !== undefined) {
      this.fill(value, null, null);
    }
  }

  protected override createEmpty(): JsonTree {
    return new JsonTree(undefined, { pathSeparator: this.pathSeparator });
  }

  override clone(options: CloneOptions = {}): JsonTree {
    return this.copyInto(this.createEmpty(), options);
  }

  override subtree(nid: string, options: SubtreeOptions = {}): [NodeKey | null, JsonTree] {
    return this.extractInto(this.createEmpty(), nid, options);
  }

  private fill(value: unknown, parentId: string | null, key: NodeKey | null): void {
    if (Array.isArray(value)) {
      const node = new TreeNode<JsonScalar>(null, { keyed: false });
      this.insertNode(node, { parentId, key });
      for (const item of value) this.fill(item, node.identifier, null);
      return;
    }
    if (isPlainObject(value)) {
      const node = new TreeNode<JsonScalar>(null, { keyed: true });
      this.insertNode(node, { parentId, key });
      for (const [childKey, item] of Object.entries(value)) this.fill(item, node.identifier, childKey);
      return;
    }
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      const leaf = new TreeNode<JsonScalar>(null, { acceptsChildren: false, data: value });
      this.insertNode(leaf, { parentId, key });
      return;
    }
    throw new InvalidArgumentError(
      `Value of type <${typeof value}> can't be represented in a JSON tree`,
      'value',
      'createJsonTree'
    );
  }

  /**
   * Converts the tree (or the subtree at `nid`) back to a JSON value
   */
  toJson(nid?: string | null): JsonValue | undefined {
    const start = nid ?? this.root;
    if (start === null) return undefined;
    const [, node] = this.get(start);
    if (!node.acceptsChildren) return node.data ?? null;

    const children = this.children(start);
    if (!node.keyed) {
      return children.map(([, child]) => this.toJson(child.identifier) ?? null);
    }
    // fromEntries defines own properties, "__proto__" included
    return Object.fromEntries(
      children.map(([key, child]): [string, JsonValue] => [
        String(key),
        this.toJson(child.identifier) ?? null,
      ])
    );
  }
}
