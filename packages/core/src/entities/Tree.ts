import {
  AmbiguousInsertionError,
  DuplicateKeyError,
  DuplicateNodeError,
  InvalidArgumentError,
  InvalidOperationError,
  MultipleRootError,
  NodeNotFoundError,
  PathNotFoundError,
  SchemaValidationError,
} from '../errors/tree.js';
import { type SerializedTree, serializedTreeSchema } from '../schemas/tree.js';
import type { SerializedNode } from '../schemas/node.js';
import { toSchemaValidationError } from '../schemas/validation.js';
import { cfg } from '../utils/config.js';
import { createModuleLogger } from '../utils/logger.js';
import { type NodeKey, TreeIndex } from './TreeIndex.js';
import { TreeNode } from './TreeNode.js';
import { type ShowOptions, renderTree, sortEntries } from './TreeRenderer.js';
import { type ValidationOptions, type ValidationResult, validateTreeIndex } from './TreeValidation.js';

const logger = createModuleLogger('Tree');

/**
 * A node along with its key under its parent (`null` for the root)
 */
export type NodeEntry<N> = [key: NodeKey | null, node: N];

export type NodeFilter<N> = (key: NodeKey | null, node: N) => boolean;

/**
 * Value used to order siblings; the key by default
 */
export type SortKey<N> = (key: NodeKey | null, node: N) => string | number | null;

export type TraversalMode = 'depth' | 'width';

export interface TreeOptions {
  /** Separator used by path addressing, `.` unless configured otherwise */
  pathSeparator?: string;
}

export interface InsertNodeOptions {
  /** Insert below this node */
  parentId?: string | null;
  /** Insert above this node, in its slot */
  childId?: string | null;
  key?: NodeKey | null;
  /** `parentId` / `childId` are paths rather than identifiers */
  byPath?: boolean;
}

export interface InsertTreeOptions extends InsertNodeOptions {
  /** Node of the inserted tree under which the existing subtree is placed (insertion above) */
  childIdBelow?: string | null;
}

export interface CloneOptions {
  withNodes?: boolean;
  /** Duplicate nodes instead of sharing them with the source tree */
  deep?: boolean;
  /** Clone only the subtree starting at this node */
  newRoot?: string | null;
}

export interface SubtreeOptions {
  deep?: boolean;
  byPath?: boolean;
}

export interface ExpandOptions<N> {
  mode?: TraversalMode;
  filter?: NodeFilter<N>;
  /** Nodes failing the filter are not yielded but their descendants still are */
  filterThrough?: boolean;
  sortKey?: SortKey<N>;
  reverse?: boolean;
}

export interface ListOptions<N> {
  idIn?: Iterable<string>;
  depthIn?: Iterable<number>;
  filter?: (node: N) => boolean;
}

export interface AncestorsOptions {
  fromRoot?: boolean;
  includeCurrent?: boolean;
}

// identifiers such as "constructor" must not resolve to inherited members
function ownValue<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Mutable ordered tree.
 *
 * Principles:
 * - each node is identified by an id, unique within the tree
 * - "keyed" nodes reference their children by string key (map)
 * - unkeyed nodes reference their children by position (list)
 * - a node is placed by naming its parent and its key under that parent
 *
 * Shallow clones, subtrees and merges share node instances with their source.
 * Traversals are lazy: mutating the tree while one is being consumed is not
 * supported and not detected.
 */
export class Tree<N extends TreeNode = TreeNode> {
  protected readonly index = new TreeIndex<N>();
  readonly pathSeparator: string;

  constructor(options: TreeOptions = {}) {
    const pathSeparator = options.pathSeparator ?? cfg.TREE_PATH_SEPARATOR;
    if (typeof pathSeparator !== 'string' || pathSeparator.length === 0) {
      throw new InvalidArgumentError(
        'Path separator must be a non-empty string',
        'pathSeparator',
        'createTree'
      );
    }
    this.pathSeparator = pathSeparator;
  }

  // Core getters
  get root(): string | null {
    return this.index.root;
  }

  get size(): number {
    return this.index.nodes.size;
  }

  contains(id: string): boolean {
    return this.index.has(id);
  }

  isEmpty(): boolean {
    return this.index.root === null;
  }

  /**
   * Hook creating the empty tree that clones and subtrees are built into.
   * Subclasses override it to keep their class and settings.
   */
  protected createEmpty(): Tree<N> {
    return new Tree<N>({ pathSeparator: this.pathSeparator });
  }

  protected ensurePresent(id: string, operation: string): N {
    const node = this.index.nodes.get(id);
    if (node === undefined) {
      throw new NodeNotFoundError(id, operation);
    }
    return node;
  }

  private resolveId(idOrPath: string, byPath: boolean | undefined, operation: string): string {
    if (byPath) return this.getNodeIdByPath(idOrPath);
    this.ensurePresent(idOrPath, operation);
    return idOrPath;
  }

  // Query methods
  get(id: string): NodeEntry<N> {
    const node = this.ensurePresent(id, 'get');
    return [this.index.keyOf(id), node];
  }

  /**
   * Key of a node: `null` for the root, string under keyed parents, position under list parents
   */
  getKey(id: string): NodeKey | null {
    this.ensurePresent(id, 'getKey');
    return this.index.keyOf(id);
  }

  list(options: ListOptions<N> = {}): NodeEntry<N>[] {
    const idIn = options.idIn ? new Set(options.idIn) : undefined;
    const depthIn = options.depthIn ? new Set(options.depthIn) : undefined;
    const entries: NodeEntry<N>[] = [];
    for (const [id, node] of this.index.nodes) {
      if (idIn && !idIn.has(id)) continue;
      if (options.filter && !options.filter(node)) continue;
      if (depthIn && !depthIn.has(this.depth(id))) continue;
      entries.push([this.index.keyOf(id), node]);
    }
    return entries;
  }

  /**
   * Identifier of the parent node; the root has none, asking for it fails
   */
  parentId(id: string): string {
    this.ensurePresent(id, 'parentId');
    const parentId = this.index.parents.get(id);
    if (parentId === undefined) {
      throw new NodeNotFoundError(id, 'parentId', { reason: 'root node has no parent' });
    }
    return parentId;
  }

  parent(id: string): NodeEntry<N> {
    return this.get(this.parentId(id));
  }

  childrenIds(id: string): string[] {
    this.ensurePresent(id, 'childrenIds');
    return this.index.childIds(id);
  }

  children(id: string): NodeEntry<N>[] {
    this.ensurePresent(id, 'children');
    return this.index
      .childEntries(id)
      .map(([key, childId]): NodeEntry<N> => [key, this.ensurePresent(childId, 'children')]);
  }

  siblingsIds(id: string): string[] {
    this.ensurePresent(id, 'siblingsIds');
    const parentId = this.index.parents.get(id);
    if (parentId === undefined) return [];
    return this.index.childIds(parentId).filter((siblingId) => siblingId !== id);
  }

  siblings(id: string): NodeEntry<N>[] {
    this.ensurePresent(id, 'siblings');
    const parentId = this.index.parents.get(id);
    if (parentId === undefined) return [];
    return this.index
      .childEntries(parentId)
      .filter(([, siblingId]) => siblingId !== id)
      .map(([key, siblingId]): NodeEntry<N> => [key, this.ensurePresent(siblingId, 'siblings')]);
  }

  isLeaf(id: string): boolean {
    this.ensurePresent(id, 'isLeaf');
    return this.index.childCount(id) === 0;
  }

  /**
   * Depth of a node, 0 being the root
   */
  depth(id: string): number {
    return this.ancestorsIds(id).length;
  }

  ancestorsIds(id: string, options: AncestorsOptions = {}): string[] {
    this.ensurePresent(id, 'ancestorsIds');
    const ancestorIds = options.includeCurrent ? [id] : [];
    let current = this.index.parents.get(id);
    while (current !== undefined) {
      ancestorIds.push(current);
      current = this.index.parents.get(current);
    }
    return options.fromRoot ? ancestorIds.reverse() : ancestorIds;
  }

  ancestors(id: string, options: AncestorsOptions = {}): NodeEntry<N>[] {
    return this.ancestorsIds(id, options).map((ancestorId) => this.get(ancestorId));
  }

  /**
   * Nodes without children under `nid` (whole tree by default), in depth-first order
   */
  leavesIds(nid?: string | null): string[] {
    const leaves: string[] = [];
    for (const [, node] of this.expand(nid)) {
      if (this.index.childCount(node.identifier) === 0) leaves.push(node.identifier);
    }
    return leaves;
  }

  leaves(nid?: string | null): NodeEntry<N>[] {
    return this.leavesIds(nid).map((leafId) => this.get(leafId));
  }

  // Duplication
  clone(options: CloneOptions = {}): Tree<N> {
    return this.copyInto(this.createEmpty(), options);
  }

  /**
   * Independent tree made of `nid` and its descendants, with the key `nid` has here
   */
  subtree(nid: string, options: SubtreeOptions = {}): [NodeKey | null, Tree<N>] {
    return this.extractInto(this.createEmpty(), nid, options);
  }

  /**
   * Fills `tree`, an empty tree from {@link createEmpty}, with this tree's
   * content. Subclasses call it to narrow the return type of `clone`.
   */
  protected copyInto<T extends Tree<N>>(tree: T, options: CloneOptions): T {
    const { withNodes = true, deep = false, newRoot } = options;
    if (!withNodes) return tree;

    for (const [key, node] of this.expand(newRoot)) {
      const copy = deep ? node.clone() : node;
      const parentId = tree.isEmpty() ? null : this.parentId(node.identifier);
      tree.index.register(copy, parentId, parentId === null ? null : key);
    }
    return tree;
  }

  protected extractInto<T extends Tree<N>>(
    tree: T,
    nid: string,
    options: SubtreeOptions
  ): [NodeKey | null, T] {
    const id = this.resolveId(nid, options.byPath, 'subtree');
    return [this.index.keyOf(id), this.copyInto(tree, { deep: options.deep ?? false, newRoot: id })];
  }

  // Insertion
  insert(item: N | Tree<N>, options: InsertTreeOptions = {}): NodeKey | null | undefined {
    if (item instanceof Tree) {
      return this.insertTree(item, options);
    }
    if (options.childIdBelow != null) {
      throw new InvalidArgumentError(
        '"childIdBelow" parameter is reserved to tree insertion.',
        'childIdBelow',
        'insert'
      );
    }
    return this.insertNode(item, options);
  }

  /**
   * Inserts a node below `parentId`, above `childId`, or as root when neither is given.
   * Returns the key the node is registered under.
   */
  insertNode(node: N, options: InsertNodeOptions = {}): NodeKey | null {
    const operation = 'insertNode';
    this.validateNodeInsertion(node, operation);
    const { parentId, childId, key = null, byPath } = options;
    if (parentId != null && childId != null) {
      throw new InvalidArgumentError(
        'Can declare at most "parentId" or "childId"',
        'parentId',
        operation
      );
    }

    if (childId != null) {
      this.insertNodeAbove(node, this.resolveId(childId, byPath, operation), key);
      return this.index.keyOf(node.identifier);
    }

    const resolvedParentId = parentId == null ? null : this.resolveId(parentId, byPath, operation);
    this.validateSlot(resolvedParentId, key, operation);
    return this.index.register(node, resolvedParentId, key);
  }

  private insertNodeAbove(node: N, childId: string, key: NodeKey | null): void {
    const operation = 'insertNodeAbove';
    // the new node starts empty, only the key kind can be wrong
    this.validateKey(node, node.identifier, key, operation);

    const parentId = this.index.parents.get(childId) ?? null;
    const [slotKey, detached] = this.dropSubtree(childId);
    this.index.register(node, parentId, slotKey);
    this.insertTreeBelow(detached, node.identifier, key);
  }

  /**
   * Pastes a whole tree below `parentId`, above `childId`, or as root.
   * Incoming nodes are shared with `newTree`, which is left untouched.
   * Returns the key of the incoming root, `undefined` when `newTree` is empty.
   */
  insertTree(newTree: Tree<N>, options: InsertTreeOptions = {}): NodeKey | null | undefined {
    const operation = 'insertTree';
    this.validateTreeInsertion(newTree, operation);
    const newRoot = newTree.root;
    if (newRoot === null) return undefined;

    const { parentId, childId, childIdBelow, key = null, byPath } = options;
    if (parentId != null && childId != null) {
      throw new InvalidArgumentError(
        'Can declare at most "parentId" or "childId"',
        'parentId',
        operation
      );
    }

    if (childId != null) {
      this.insertTreeAbove(newTree, this.resolveId(childId, byPath, operation), childIdBelow, key);
    } else {
      const resolvedParentId =
        parentId == null ? null : this.resolveId(parentId, byPath, operation);
      this.insertTreeBelow(newTree, resolvedParentId, key);
    }
    return this.index.keyOf(newRoot);
  }

  private insertTreeBelow(newTree: Tree<N>, parentId: string | null, key: NodeKey | null): void {
    this.validateSlot(parentId, key, 'insertTree');
    const newRoot = newTree.root;
    if (newRoot === null) return;

    for (const [newKey, newNode] of newTree.expand()) {
      const nid = newNode.identifier;
      if (nid === newRoot) {
        this.index.register(newNode, parentId, key);
      } else {
        this.index.register(newNode, newTree.parentId(nid), newKey);
      }
    }
    logger.debug({ parentId, root: newRoot, nodes: newTree.size }, 'Tree inserted');
  }

  private insertTreeAbove(
    newTree: Tree<N>,
    childId: string,
    childIdBelow: string | null | undefined,
    key: NodeKey | null
  ): void {
    const operation = 'insertTreeAbove';
    // make all checks before modifying tree
    let belowId: string;
    if (childIdBelow != null) {
      newTree.ensurePresent(childIdBelow, operation);
      belowId = childIdBelow;
    } else {
      const leaves = newTree.leavesIds();
      const [uniqueLeaf] = leaves;
      if (leaves.length !== 1 || uniqueLeaf === undefined) {
        throw new AmbiguousInsertionError(leaves, operation);
      }
      belowId = uniqueLeaf;
    }
    const [, belowNode] = newTree.get(belowId);
    newTree.validateKey(belowNode, belowId, key, operation);

    const parentId = this.index.parents.get(childId) ?? null;
    const [slotKey, detached] = this.dropSubtree(childId);
    this.insertTreeBelow(newTree, parentId, slotKey);
    this.insertTreeBelow(detached, belowId, key);
  }

  private validateNodeInsertion(node: N, operation: string): void {
    if (!(node instanceof TreeNode)) {
      throw new InvalidArgumentError('Node must be instance of <TreeNode>', 'node', operation);
    }
    if (this.index.has(node.identifier)) {
      throw new DuplicateNodeError(node.identifier, operation);
    }
  }

  /**
   * Whole incoming identifier set is checked before anything is mutated
   */
  private validateTreeInsertion(newTree: Tree<N>, operation: string): void {
    if (!(newTree instanceof Tree)) {
      throw new InvalidArgumentError('Tree must be instance of <Tree>', 'tree', operation);
    }
    for (const id of newTree.index.nodes.keys()) {
      if (this.index.has(id)) {
        throw new DuplicateNodeError(id, operation);
      }
    }
  }

  /**
   * Checks that a node can be placed under `parentId` (root when null) at `key`
   */
  private validateSlot(parentId: string | null, key: NodeKey | null, operation: string): void {
    if (parentId === null) {
      if (!this.isEmpty()) {
        throw new MultipleRootError('A tree can only have one root', operation);
      }
      if (key !== null) {
        throw new InvalidOperationError('No key on root node', operation, { key });
      }
      return;
    }
    this.validateKey(this.ensurePresent(parentId, operation), parentId, key, operation);
  }

  protected validateKey(parent: N, parentId: string, key: NodeKey | null, operation: string): void {
    if (!parent.acceptsChildren) {
      throw new InvalidOperationError(`Node <${parentId}> doesn't accept children`, operation, {
        parentId,
      });
    }
    if (parent.keyed) {
      if (typeof key !== 'string') {
        throw new InvalidOperationError(
          `Key must be of type "string" under keyed node <${parentId}>, got ${key === null ? 'none' : typeof key}`,
          operation,
          { parentId, key }
        );
      }
      if (this.index.childIdByKey(parentId, key) !== undefined) {
        throw new DuplicateKeyError(key, parentId, operation);
      }
      return;
    }
    if (key !== null && !(typeof key === 'number' && Number.isInteger(key))) {
      throw new InvalidOperationError(
        `Key must be an integer under list node <${parentId}>, got ${typeof key}`,
        operation,
        { parentId, key }
      );
    }
  }

  // Removal
  private dropLeaf(id: string): NodeEntry<N> {
    if (this.index.childCount(id) > 0) {
      throw new InvalidOperationError('Cannot drop node having children.', 'dropNode', { id });
    }
    const entry = this.get(id);
    this.index.remove(id);
    return entry;
  }

  /**
   * Drops a node and returns its key and node.
   *
   * With `withChildren=false` the node's children are rebased onto its parent,
   * which requires both to be of the same kind (map keys and list positions
   * are not interchangeable). List children take the dropped node's position.
   */
  dropNode(id: string, withChildren = true): NodeEntry<N> {
    this.ensurePresent(id, 'dropNode');
    if (!withChildren) return this.rebase(id);

    // reversed pre-order removes every child before its parent
    const ids = [...this.expand(id)].map(([, node]) => node.identifier).reverse();
    let dropped = this.get(id);
    for (const nid of ids) {
      dropped = this.dropLeaf(nid);
    }
    return dropped;
  }

  private rebase(id: string): NodeEntry<N> {
    const operation = 'dropNode';
    const childIds = this.index.childIds(id);
    const [key, node] = this.get(id);
    const parentId = this.index.parents.get(id);

    if (parentId === undefined) {
      if (childIds.length > 1) {
        throw new MultipleRootError(
          `Cannot drop current root <${id}> without its children, else tree would have multiple roots`,
          operation
        );
      }
      const [onlyChild] = childIds;
      const detached = onlyChild === undefined ? undefined : this.dropSubtree(onlyChild)[1];
      this.dropLeaf(id);
      if (detached) this.insertTreeBelow(detached, null, null);
      return [key, node];
    }

    const parent = this.ensurePresent(parentId, operation);
    if (parent.keyed !== node.keyed) {
      throw new InvalidOperationError(
        `Cannot drop <${id}> without its children: it isn't of the same kind as its parent <${parentId}>`,
        operation,
        { id, parentId }
      );
    }
    if (parent.keyed) {
      for (const childId of childIds) {
        const childKey = String(this.index.keyOf(childId));
        const holder = this.index.childIdByKey(parentId, childKey);
        if (holder !== undefined && holder !== id) {
          throw new DuplicateKeyError(childKey, parentId, operation);
        }
      }
    }

    const detached = childIds.map((childId) => this.dropSubtree(childId));
    this.dropLeaf(id);
    const position = typeof key === 'number' ? key : 0;
    for (const [offset, [childKey, subtree]] of detached.entries()) {
      this.insertTreeBelow(subtree, parentId, parent.keyed ? childKey : position + offset);
    }
    logger.debug({ id, parentId, rebased: childIds.length }, 'Node dropped, children rebased');
    return [key, node];
  }

  /**
   * Removes `nid` and its descendants, returning them as an independent tree
   */
  dropSubtree(nid: string): [NodeKey | null, Tree<N>] {
    const [key, removed] = this.subtree(nid);
    this.dropNode(nid, true);
    logger.debug({ nid, nodes: removed.size }, 'Subtree dropped');
    return [key, removed];
  }

  /**
   * Pastes the children of `newTree`'s root under `nid` (root by default),
   * keeping their keys. `newTree`'s root itself is not pasted, unless this
   * tree is empty and no `nid` is given: `newTree` then becomes its content.
   *
   * ```
   * root          root2          root
   * ├── A         ├── C          ├── A
   * └── B         └── D    =>    └── B
   *                                  ├── C
   *                                  └── D
   * ```
   */
  merge(newTree: Tree<N>, nid?: string | null): this {
    const operation = 'merge';
    if (!(newTree instanceof Tree)) {
      throw new InvalidArgumentError('Tree must be instance of <Tree>', 'tree', operation);
    }
    if (this.isEmpty() && nid == null) {
      this.insertTree(newTree);
      return this;
    }

    const targetId = nid ?? this.root;
    if (targetId === null) return this;
    const target = this.ensurePresent(targetId, operation);
    const newRoot = newTree.root;
    if (newRoot === null) return this;

    // make all checks before modifying tree
    const grafts = newTree.children(newRoot);
    for (const [, child] of grafts) {
      for (const [, node] of newTree.expand(child.identifier)) {
        if (this.index.has(node.identifier)) {
          throw new DuplicateNodeError(node.identifier, operation);
        }
      }
    }
    for (const [childKey] of grafts) {
      this.validateKey(target, targetId, childKey, operation);
    }

    for (const [childKey, child] of grafts) {
      this.insertTreeBelow(newTree.subtree(child.identifier)[1], targetId, childKey);
    }
    logger.debug({ targetId, grafted: grafts.length }, 'Tree merged');
    return this;
  }

  // Traversal
  /**
   * Lazily walks the tree (or the subtree at `nid`), depth-first pre-order or
   * breadth-first. Siblings are ordered by `sortKey` (their key by default).
   * Nodes failing `filter` are skipped along with their descendants, unless
   * `filterThrough` is set.
   */
  expand(nid?: string | null, options: ExpandOptions<N> = {}): IterableIterator<NodeEntry<N>> {
    const mode = options.mode ?? 'depth';
    if (mode !== 'depth' && mode !== 'width') {
      throw new InvalidArgumentError(`Traversal mode '${String(mode)}' is not supported`, 'mode', 'expand');
    }
    if (nid != null) this.ensurePresent(nid, 'expand');
    return this.walk(nid ?? this.root, mode, options);
  }

  private *walk(
    start: string | null,
    mode: TraversalMode,
    options: ExpandOptions<N>
  ): Generator<NodeEntry<N>, void, undefined> {
    if (start === null) return;
    const { filter, filterThrough = false, sortKey, reverse = false } = options;
    const passes = ([key, node]: NodeEntry<N>) => !filter || filter(key, node);
    const expandChildren = (id: string) =>
      sortEntries(
        this.children(id).filter((entry) => filterThrough || passes(entry)),
        sortKey,
        reverse
      );

    const first = this.get(start);
    const firstPasses = passes(first);
    if (firstPasses) yield first;
    if (!firstPasses && !filterThrough) return;

    let queue = expandChildren(start);
    let current = queue.shift();
    while (current !== undefined) {
      if (passes(current)) yield current;
      const expansion = expandChildren(current[1].identifier);
      // depth-first splices in front, width-first at the back
      queue = mode === 'depth' ? [...expansion, ...queue] : [...queue, ...expansion];
      current = queue.shift();
    }
  }

  show(options: ShowOptions<N> = {}): string {
    return renderTree(this, options);
  }

  // Path addressing
  getNodeIdByPath(path: string): string {
    const operation = 'getNodeIdByPath';
    const root = this.root;
    if (root === null) {
      throw new PathNotFoundError(path, '', operation);
    }
    if (path === '') return root;

    let nid = root;
    for (const segment of path.split(this.pathSeparator)) {
      const node = this.ensurePresent(nid, operation);
      let childId: string | undefined;
      if (node.keyed) {
        childId = this.index.childIdByKey(nid, segment);
      } else if (/^\d+$/.test(segment)) {
        childId = this.index.listChildren.get(nid)?.[Number(segment)];
      }
      if (childId === undefined) {
        throw new PathNotFoundError(path, segment, operation);
      }
      nid = childId;
    }
    return nid;
  }

  getPath(nid: string): string {
    return this.ancestorsIds(nid, { fromRoot: true, includeCurrent: true })
      .slice(1)
      .map((id) => String(this.index.keyOf(id)))
      .join(this.pathSeparator);
  }

  // Serialization
  serialize(): SerializedTree {
    const nodes: Array<[string, SerializedNode]> = [];
    const parentOf: Array<[string, string | null]> = [];
    const childrenOf: Array<[string, string[] | Record<string, string>]> = [];
    for (const [id, node] of this.index.nodes) {
      nodes.push([id, node.serialize()]);
      parentOf.push([id, this.index.parents.get(id) ?? null]);
      const keyed = this.index.mapChildren.get(id);
      if (keyed) {
        const byKey = [...keyed].map(([childId, key]): [string, string] => [key, childId]);
        childrenOf.push([id, Object.fromEntries(byKey)]);
      } else if (node.acceptsChildren) {
        childrenOf.push([id, [...(this.index.listChildren.get(id) ?? [])]]);
      }
    }
    // fromEntries keeps keys such as "__proto__" as own properties
    return {
      root: this.root,
      nodes: Object.fromEntries(nodes),
      parentOf: Object.fromEntries(parentOf),
      childrenOf: Object.fromEntries(childrenOf),
    };
  }

  /**
   * Rebuilds a tree from its serialized form
   */
  static deserialize(raw: unknown, options: TreeOptions = {}): Tree {
    const operation = 'deserialize';
    const parsed = serializedTreeSchema.safeParse(raw);
    if (!parsed.success) {
      throw toSchemaValidationError('Invalid serialized tree', parsed.error, operation);
    }
    const data = parsed.data;
    const invalid = (field: string, message: string) =>
      new SchemaValidationError('Invalid serialized tree', [{ field, message, code: 'custom' }], operation);

    const tree = new Tree(options);
    const pending: Array<[id: string, parentId: string | null, key: NodeKey | null]> = [];
    if (data.root !== null) pending.push([data.root, null, null]);

    let item = pending.shift();
    while (item !== undefined) {
      const [id, parentId, key] = item;
      const serialized = ownValue(data.nodes, id);
      if (serialized === undefined) {
        throw invalid(`nodes.${id}`, `Node <${id}> is referenced but not described`);
      }
      if (serialized.identifier !== id) {
        throw invalid(`nodes.${id}.identifier`, `Identifier <${serialized.identifier}> doesn't match <${id}>`);
      }
      if ((ownValue(data.parentOf, id) ?? null) !== parentId) {
        throw invalid(`parentOf.${id}`, `Parent of <${id}> should be <${String(parentId)}>`);
      }
      const { identifier, ...nodeOptions } = serialized;
      tree.insertNode(new TreeNode(identifier, nodeOptions), { parentId, key });

      const children = ownValue(data.childrenOf, id);
      if (Array.isArray(children)) {
        for (const childId of children) pending.push([childId, id, null]);
      } else if (children !== undefined) {
        for (const [childKey, childId] of Object.entries(children)) pending.push([childId, id, childKey]);
      }
      item = pending.shift();
    }

    if (tree.size !== Object.keys(data.nodes).length) {
      throw invalid('nodes', 'Some nodes are not reachable from root');
    }
    return tree;
  }

  // Validation
  validate(options: ValidationOptions = {}): ValidationResult {
    return validateTreeIndex(this.index, options);
  }

  toString(): string {
    return this.show();
  }
}
