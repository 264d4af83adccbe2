/**
 * lattice-tree core - mutable ordered trees mixing keyed and list nodes
 *
 * This is the main entry point. Narrower entry points:
 * - @lattice-tree/core/tree - Tree containers, rendering and validation
 * - @lattice-tree/core/errors - Error handling
 * - @lattice-tree/core/utils - Logging and configuration
 */

// Trees
export { Tree, TreeNode, JsonTree } from './entities/index.js';
export type {
  NodeEntry,
  NodeKey,
  NodeFilter,
  SortKey,
  TraversalMode,
  TreeOptions,
  TreeNodeOptions,
  InsertNodeOptions,
  InsertTreeOptions,
  CloneOptions,
  SubtreeOptions,
  ExpandOptions,
  ListOptions,
  AncestorsOptions,
  ShowOptions,
  LineType,
  JsonScalar,
  JsonValue,
  ValidationResult,
} from './entities/index.js';
export { validateTree } from './entities/index.js';

// Serialized form
export type { SerializedNode, SerializedTree } from './schemas/index.js';

// Errors
export {
  LatticeError,
  TreeError,
  NodeNotFoundError,
  PathNotFoundError,
  MultipleRootError,
  DuplicateNodeError,
  DuplicateKeyError,
  InvalidOperationError,
  AmbiguousInsertionError,
  InvalidArgumentError,
  SchemaValidationError,
  isLatticeError,
} from './errors/index.js';

// Logging and configuration
export { createModuleLogger, logger } from './utils/logger.js';
export { cfg, type AppConfig } from './utils/config.js';
