/**
 * Centralized error handling for lattice-tree
 *
 * This module exports all error classes and utilities for consistent
 * error handling across the library.
 */

// Base error classes and utilities
export { LatticeError, isLatticeError, extractErrorDetails, type ErrorDetails } from './base.js';

// Tree errors
export {
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
} from './tree.js';
