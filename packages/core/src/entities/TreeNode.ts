import { randomUUID } from 'node:crypto';
import { InvalidArgumentError } from '../errors/tree.js';
import { type SerializedNode, serializedNodeSchema } from '../schemas/node.js';
import { toSchemaValidationError } from '../schemas/validation.js';
import { DISPLAY_CONFIG } from './TreeConstants.js';

function copyValue(value: unknown, seen: Map<object, object>): unknown {
  if (typeof value !== 'object' || value === null) return value;
  const known = seen.get(value);
  if (known !== undefined) return known;

  if (Array.isArray(value)) {
    const items: unknown[] = [];
    seen.set(value, items);
    for (const item of value) items.push(copyValue(item, seen));
    return items;
  }
  if (value instanceof Date) {
    const date = new Date(value.getTime());
    seen.set(value, date);
    return date;
  }
  if (value instanceof Map) {
    const entries = new Map<unknown, unknown>();
    seen.set(value, entries);
    for (const [key, item] of value) entries.set(copyValue(key, seen), copyValue(item, seen));
    return entries;
  }
  if (value instanceof Set) {
    const items = new Set<unknown>();
    seen.set(value, items);
    for (const item of value) items.add(copyValue(item, seen));
    return items;
  }
  const copy: object = Object.create(Object.getPrototypeOf(value));
  seen.set(value, copy);
  copyOwnProperties(value, copy, seen);
  return copy;
}

// accessors are carried over as they are, data properties are copied
function copyOwnProperties(source: object, target: object, seen: Map<object, object>): void {
  for (const name of Reflect.ownKeys(source)) {
    const descriptor = Object.getOwnPropertyDescriptor(source, name);
    if (descriptor === undefined) continue;
    if ('value' in descriptor) descriptor.value = copyValue(descriptor.value, seen);
    Object.defineProperty(target, name, descriptor);
  }
}

export interface TreeNodeOptions<D> {
  /** Generate a UUID when no identifier is given (default: true) */
  autoId?: boolean;
  /** Children addressed by string keys (map) or by position (list) */
  keyed?: boolean;
  acceptsChildren?: boolean;
  /** Display string, overrides the default representation */
  repr?: string;
  data?: D;
}

/**
 * A node of a {@link Tree}.
 *
 * The node only carries its own description: where it sits (parent, key) is
 * tracked by the tree that holds it. Shallow clones and merges share node
 * instances between trees, so treat nodes as read-mostly once they are
 * inserted in more than one tree.
 */
export class TreeNode<D = unknown> {
  readonly identifier: string;
  readonly keyed: boolean;
  readonly acceptsChildren: boolean;
  repr: string | undefined;
  data: D | undefined;

  constructor(identifier?: string | null, options: TreeNodeOptions<D> = {}) {
    if (identifier === undefined || identifier === null) {
      if (options.autoId === false) {
        throw new InvalidArgumentError('Required identifier', 'identifier', 'createNode');
      }
      identifier = randomUUID();
    }
    if (typeof identifier !== 'string' || identifier.length === 0) {
      throw new InvalidArgumentError(
        `Identifier must be a non-empty string, got <${typeof identifier}>`,
        'identifier',
        'createNode'
      );
    }
    this.identifier = identifier;
    this.keyed = options.keyed ?? true;
    this.acceptsChildren = options.acceptsChildren ?? true;
    this.repr = options.repr;
    this.data = options.data;
  }

  /**
   * Controls how the node is displayed in tree representation.
   * First string is shown on the left, second one right-aligned:
   *
   * ```
   * {}
   * ├── one: {}                                  OneEnd
   * └── two: []                                  TwoEnd
   * ```
   */
  lineRepr(_depth: number): [start: string, end: string] {
    if (this.repr !== undefined) return [this.repr, ''];
    if (!this.acceptsChildren) return [String(this.data), ''];
    return [this.keyed ? DISPLAY_CONFIG.KEYED_REPR : DISPLAY_CONFIG.UNKEYED_REPR, ''];
  }

  /**
   * Deep copy: same class and identifier, payload duplicated.
   * Objects keep their prototype, functions are shared.
   */
  clone(): this {
    const copy: this = Object.create(Object.getPrototypeOf(this));
    copyOwnProperties(this, copy, new Map());
    return copy;
  }

  serialize(): SerializedNode {
    return {
      identifier: this.identifier,
      keyed: this.keyed,
      acceptsChildren: this.acceptsChildren,
      repr: this.repr,
      data: this.data,
    };
  }

  static deserialize(raw: unknown): TreeNode {
    const parsed = serializedNodeSchema.safeParse(raw);
    if (!parsed.success) {
      throw toSchemaValidationError('Invalid serialized node', parsed.error, 'deserializeNode');
    }
    const { identifier, ...options } = parsed.data;
    return new TreeNode(identifier, options);
  }

  toString(): string {
    return `${this.constructor.name}, id=${this.identifier}`;
  }
}
