export { nodeIdentifier, serializedNodeSchema, type SerializedNode } from './node.js';
export { serializedTreeSchema, type SerializedTree } from './tree.js';
export { toSchemaValidationError } from './validation.js';
