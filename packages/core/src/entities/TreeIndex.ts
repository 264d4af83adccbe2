import type { TreeNode } from './TreeNode.js';

/**
 * Address of a child under its parent: string key under keyed nodes,
 * 0-based position under list nodes, `null` for the root.
 */
export type NodeKey = string | number;

export interface ReadonlyTreeIndex<N extends TreeNode> {
  readonly root: string | null;
  readonly nodes: ReadonlyMap<string, N>;
  readonly parents: ReadonlyMap<string, string>;
  readonly mapChildren: ReadonlyMap<string, ReadonlyMap<string, string>>;
  readonly listChildren: ReadonlyMap<string, readonly string[]>;
}

/**
 * Dual-direction adjacency store backing a tree.
 *
 * child -> parent and parent -> children are both stored so that navigation
 * in either direction needs no scan. `register` and `remove` are the only
 * places where these maps change, which keeps the two directions consistent.
 * Callers are responsible for validating a mutation before requesting it.
 */
export class TreeIndex<N extends TreeNode> implements ReadonlyTreeIndex<N> {
  root: string | null = null;
  // node identifier -> node
  readonly nodes = new Map<string, N>();
  // node identifier -> parent node identifier
  readonly parents = new Map<string, string>();
  // keyed node identifier -> (child identifier -> key)
  readonly mapChildren = new Map<string, Map<string, string>>();
  // keyed node identifier -> (key -> child identifier), mirrors mapChildren
  private readonly childByKey = new Map<string, Map<string, string>>();
  // list node identifier -> ordered child identifiers
  readonly listChildren = new Map<string, string[]>();

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  keyOf(id: string): NodeKey | null {
    const parentId = this.parents.get(id);
    if (parentId === undefined) return null;
    const keyed = this.mapChildren.get(parentId);
    if (keyed) return keyed.get(id) ?? null;
    const position = this.listChildren.get(parentId)?.indexOf(id) ?? -1;
    return position === -1 ? null : position;
  }

  childIds(id: string): string[] {
    const keyed = this.mapChildren.get(id);
    if (keyed) return [...keyed.keys()];
    return [...(this.listChildren.get(id) ?? [])];
  }

  /**
   * Children of `id` paired with their keys, in order
   */
  childEntries(id: string): Array<[NodeKey, string]> {
    const keyed = this.mapChildren.get(id);
    if (keyed) return [...keyed].map(([childId, key]): [NodeKey, string] => [key, childId]);
    return (this.listChildren.get(id) ?? []).map((childId, position): [NodeKey, string] => [
      position,
      childId,
    ]);
  }

  childCount(id: string): number {
    return this.mapChildren.get(id)?.size ?? this.listChildren.get(id)?.length ?? 0;
  }

  /**
   * Identifier of the child registered under `key` of a keyed parent
   */
  childIdByKey(parentId: string, key: string): string | undefined {
    return this.childByKey.get(parentId)?.get(key);
  }

  /**
   * Adds a node, as root when `parentId` is null, else under `parentId` at `key`.
   * Returns the key the node ends up with.
   */
  register(node: N, parentId: string | null, key: NodeKey | null): NodeKey | null {
    const id = node.identifier;
    this.nodes.set(id, node);
    if (node.acceptsChildren) {
      if (node.keyed) {
        this.mapChildren.set(id, new Map());
        this.childByKey.set(id, new Map());
      } else this.listChildren.set(id, []);
    }

    if (parentId === null) {
      this.root = id;
      return null;
    }

    this.parents.set(id, parentId);
    const keyed = this.mapChildren.get(parentId);
    if (keyed) {
      const childKey = String(key);
      keyed.set(id, childKey);
      this.childByKey.get(parentId)?.set(childKey, id);
      return childKey;
    }
    const list = this.listChildren.get(parentId) ?? [];
    if (typeof key === 'number') list.splice(key, 0, id);
    else list.push(id);
    this.listChildren.set(parentId, list);
    return list.indexOf(id);
  }

  /**
   * Removes a node that has no children, dereferencing it from its parent
   */
  remove(id: string): void {
    const parentId = this.parents.get(id);
    if (parentId !== undefined) {
      this.parents.delete(id);
      const keyed = this.mapChildren.get(parentId);
      const key = keyed?.get(id);
      if (keyed && key !== undefined) {
        keyed.delete(id);
        this.childByKey.get(parentId)?.delete(key);
      }
      const list = this.listChildren.get(parentId);
      if (list) {
        const position = list.indexOf(id);
        if (position !== -1) list.splice(position, 1);
      }
    }
    this.mapChildren.delete(id);
    this.childByKey.delete(id);
    this.listChildren.delete(id);
    this.nodes.delete(id);
    if (this.root === id) this.root = null;
  }
}
