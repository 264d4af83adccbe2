/**
 * Tree-specific error classes
 *
 * One class per contract violation of the tree API. They are thrown
 * synchronously and never retried: each one signals a caller mistake.
 */

import { LatticeError } from './base.js';

/**
 * Base class for tree structure errors
 */
export abstract class TreeError extends LatticeError {
  constructor(message: string, operation?: string, context?: Record<string, unknown>) {
    super(message, 'tree', operation, context);
  }
}

/**
 * Error thrown when an identifier is not present in the tree
 */
export class NodeNotFoundError extends TreeError {
  constructor(
    public readonly nodeId: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(`Node id <${nodeId}> doesn't exist in tree`, operation, { ...context, nodeId });
  }
}

/**
 * Error thrown when a path segment cannot be resolved
 */
export class PathNotFoundError extends NodeNotFoundError {
  constructor(
    public readonly path: string,
    public readonly segment: string,
    operation?: string
  ) {
    super(segment, operation, { path });
    this.message = `Path <${path}> can't be resolved, no child under <${segment}>`;
  }
}

/**
 * Error thrown when an operation would leave the tree with two roots
 */
export class MultipleRootError extends TreeError {}

/**
 * Error thrown when an identifier is inserted a second time
 */
export class DuplicateNodeError extends TreeError {
  constructor(
    public readonly nodeId: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(`Can't create node with id '${nodeId}'`, operation, { ...context, nodeId });
  }
}

/**
 * Error thrown when a keyed parent already holds a child under the requested key
 */
export class DuplicateKeyError extends TreeError {
  constructor(
    public readonly key: string,
    public readonly parentId: string,
    operation?: string
  ) {
    super(`Already present node for key ${key} under ${parentId} node.`, operation, {
      key,
      parentId,
    });
  }
}

/**
 * Error thrown for structural type mismatches (leaf parents, key kinds, rebase across node kinds)
 */
export class InvalidOperationError extends TreeError {}

/**
 * Error thrown when a multi-leaf tree is inserted above a node without a target leaf
 */
export class AmbiguousInsertionError extends TreeError {
  constructor(
    public readonly leafIds: string[],
    operation?: string
  ) {
    super(
      'Ambiguous tree insertion, use "childIdBelow" to specify under which node of new tree you want to place existing nodes.',
      operation,
      { leafIds }
    );
  }
}

/**
 * Error thrown for malformed arguments (traversal mode, separator, limits, identifiers)
 */
export class InvalidArgumentError extends TreeError {
  constructor(
    message: string,
    public readonly argument: string,
    operation?: string
  ) {
    super(message, operation, { argument });
  }
}

/**
 * Error thrown when schema validation fails
 */
export class SchemaValidationError extends TreeError {
  constructor(
    message: string,
    public readonly validationErrors: Array<{ field: string; message: string; code: string }>,
    operation?: string
  ) {
    super(message, operation, { validationErrors });
  }
}
