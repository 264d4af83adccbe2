import type { Tree } from './Tree.js';
import { VALIDATION_CONFIG } from './TreeConstants.js';
import type { ReadonlyTreeIndex } from './TreeIndex.js';
import type { TreeNode } from './TreeNode.js';

/**
 * TreeValidation - Structural integrity checks over a tree's index store
 *
 * Checks:
 * - every non-root node points at an existing parent that lists it back
 * - exactly one root, and no node without a parent besides it
 * - no cycles in parent links
 * - leaf nodes own no children, keyed nodes own string-keyed children only
 */

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  type:
    | 'orphaned_child'
    | 'invalid_parent'
    | 'asymmetric_link'
    | 'multiple_root'
    | 'cycle'
    | 'leaf_with_children'
    | 'invalid_key';
  nodeId: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ValidationWarning {
  type: 'deep_nesting';
  nodeId: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ValidationOptions {
  maxDepth?: number;
}

const defaultValidationOptions: Required<ValidationOptions> = {
  maxDepth: VALIDATION_CONFIG.DEFAULT_MAX_DEPTH,
};

export function validateTree<N extends TreeNode>(
  tree: Tree<N>,
  options: ValidationOptions = {}
): ValidationResult {
  return tree.validate(options);
}

/**
 * Validates the adjacency maps of a tree
 */
export function validateTreeIndex<N extends TreeNode>(
  index: ReadonlyTreeIndex<N>,
  options: ValidationOptions = {}
): ValidationResult {
  const opts = { ...defaultValidationOptions, ...options };
  const errors: ValidationError[] = [
    ...validateRoot(index),
    ...validateParentLinks(index),
    ...validateChildLinks(index),
    ...detectCycles(index),
  ];
  const warnings: ValidationWarning[] = [];

  for (const id of index.nodes.keys()) {
    const depth = depthOf(index, id);
    if (depth !== undefined && depth > opts.maxDepth) {
      warnings.push({
        type: 'deep_nesting',
        nodeId: id,
        message: `Node exceeds maximum depth of ${opts.maxDepth} (current: ${depth})`,
        details: { maxDepth: opts.maxDepth, currentDepth: depth },
      });
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateRoot<N extends TreeNode>(index: ReadonlyTreeIndex<N>): ValidationError[] {
  const errors: ValidationError[] = [];
  if (index.root === null) {
    for (const id of index.nodes.keys()) {
      errors.push({
        type: 'orphaned_child',
        nodeId: id,
        message: `Node "${id}" is stored in a tree without root`,
      });
    }
    return errors;
  }

  if (!index.nodes.has(index.root)) {
    errors.push({
      type: 'invalid_parent',
      nodeId: index.root,
      message: `Root "${index.root}" is not a stored node`,
    });
  }
  if (index.parents.has(index.root)) {
    errors.push({
      type: 'invalid_parent',
      nodeId: index.root,
      message: `Root "${index.root}" has a parent`,
      details: { parentId: index.parents.get(index.root) },
    });
  }
  for (const id of index.nodes.keys()) {
    if (id !== index.root && !index.parents.has(id)) {
      errors.push({
        type: 'multiple_root',
        nodeId: id,
        message: `Node "${id}" has no parent but is not the root`,
        details: { root: index.root },
      });
    }
  }
  return errors;
}

/**
 * child -> parent direction: the parent exists, accepts children and lists the child
 */
function validateParentLinks<N extends TreeNode>(index: ReadonlyTreeIndex<N>): ValidationError[] {
  const errors: ValidationError[] = [];
  for (const [id, parentId] of index.parents) {
    const parent = index.nodes.get(parentId);
    if (!index.nodes.has(id) || parent === undefined) {
      errors.push({
        type: 'invalid_parent',
        nodeId: id,
        message: `Parent link "${id}" -> "${parentId}" references a missing node`,
        details: { parentId },
      });
      continue;
    }
    if (!parent.acceptsChildren) {
      errors.push({
        type: 'leaf_with_children',
        nodeId: parentId,
        message: `Leaf node "${parentId}" has child "${id}"`,
        details: { childId: id },
      });
    }
    const listed = parent.keyed
      ? index.mapChildren.get(parentId)?.has(id)
      : index.listChildren.get(parentId)?.includes(id);
    if (!listed) {
      errors.push({
        type: 'asymmetric_link',
        nodeId: id,
        message: `Node "${id}" points at parent "${parentId}" which doesn't list it`,
        details: { parentId },
      });
    }
  }
  return errors;
}

/**
 * parent -> children direction: each listed child points back, keys fit the parent kind
 */
function validateChildLinks<N extends TreeNode>(index: ReadonlyTreeIndex<N>): ValidationError[] {
  const errors: ValidationError[] = [];
  const checkChild = (parentId: string, childId: string) => {
    if (index.parents.get(childId) !== parentId) {
      errors.push({
        type: 'asymmetric_link',
        nodeId: childId,
        message: `Node "${parentId}" lists child "${childId}" which points elsewhere`,
        details: { parentId, actualParentId: index.parents.get(childId) },
      });
    }
  };

  for (const [parentId, children] of index.mapChildren) {
    const parent = index.nodes.get(parentId);
    if (parent === undefined || !parent.acceptsChildren || !parent.keyed) {
      errors.push({
        type: parent && !parent.acceptsChildren ? 'leaf_with_children' : 'invalid_key',
        nodeId: parentId,
        message: `Node "${parentId}" owns a keyed child index it shouldn't have`,
      });
    }
    const seenKeys = new Set<string>();
    for (const [childId, key] of children) {
      checkChild(parentId, childId);
      if (seenKeys.has(key)) {
        errors.push({
          type: 'invalid_key',
          nodeId: childId,
          message: `Key "${key}" is used twice under "${parentId}"`,
          details: { parentId, key },
        });
      }
      seenKeys.add(key);
    }
  }

  for (const [parentId, children] of index.listChildren) {
    const parent = index.nodes.get(parentId);
    if (parent === undefined || !parent.acceptsChildren || parent.keyed) {
      errors.push({
        type: parent && !parent.acceptsChildren ? 'leaf_with_children' : 'invalid_key',
        nodeId: parentId,
        message: `Node "${parentId}" owns a list child index it shouldn't have`,
      });
    }
    if (new Set(children).size !== children.length) {
      errors.push({
        type: 'invalid_key',
        nodeId: parentId,
        message: `Node "${parentId}" lists the same child twice`,
      });
    }
    for (const childId of children) checkChild(parentId, childId);
  }
  return errors;
}

function detectCycles<N extends TreeNode>(index: ReadonlyTreeIndex<N>): ValidationError[] {
  const errors: ValidationError[] = [];
  for (const id of index.nodes.keys()) {
    if (depthOf(index, id) === undefined) {
      errors.push({
        type: 'cycle',
        nodeId: id,
        message: `Cycle detected in the ancestors of "${id}"`,
      });
    }
  }
  return errors;
}

/**
 * Number of parent links up to a node without parent, `undefined` on a cycle
 */
function depthOf<N extends TreeNode>(index: ReadonlyTreeIndex<N>, id: string): number | undefined {
  const visited = new Set<string>([id]);
  let current = index.parents.get(id);
  while (current !== undefined) {
    if (visited.has(current)) return undefined;
    visited.add(current);
    current = index.parents.get(current);
  }
  return visited.size - 1;
}
