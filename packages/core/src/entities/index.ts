/**
 * @fileoverview Entities module - ordered trees with keyed and list nodes
 *
 * @module entities
 */

export {
  Tree,
  type NodeEntry,
  type NodeFilter,
  type SortKey,
  type TraversalMode,
  type TreeOptions,
  type InsertNodeOptions,
  type InsertTreeOptions,
  type CloneOptions,
  type SubtreeOptions,
  type ExpandOptions,
  type ListOptions,
  type AncestorsOptions,
} from './Tree.js';
export { TreeNode, type TreeNodeOptions } from './TreeNode.js';
export { TreeIndex, type NodeKey, type ReadonlyTreeIndex } from './TreeIndex.js';
export { JsonTree, type JsonNode, type JsonScalar, type JsonValue } from './JsonTree.js';
export {
  renderTree,
  iterNodesWithLocation,
  linePrefixRepr,
  lineRepr,
  sortEntries,
  compareSortValues,
  type ShowOptions,
  type NodeLocation,
} from './TreeRenderer.js';
export {
  validateTree,
  validateTreeIndex,
  type ValidationResult,
  type ValidationError,
  type ValidationWarning,
  type ValidationOptions,
} from './TreeValidation.js';
export {
  LINE_STYLES,
  DISPLAY_CONFIG,
  VALIDATION_CONFIG,
  isLineType,
  type LineType,
} from './TreeConstants.js';
