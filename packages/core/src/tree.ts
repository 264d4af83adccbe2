/**
 * Tree Toolkit
 *
 * - Tree containers (generic and JSON-backed) and their nodes
 * - Rendering helpers
 * - Structure validation
 * - Serialized form schemas
 */

export * from './entities/index.js';
export * from './schemas/index.js';
