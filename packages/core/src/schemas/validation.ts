import type { ZodError } from 'zod';
import { SchemaValidationError } from '../errors/tree.js';

/**
 * Turns a zod failure into the library's schema error
 */
export function toSchemaValidationError(
  message: string,
  error: ZodError,
  operation: string
): SchemaValidationError {
  return new SchemaValidationError(
    message,
    error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    })),
    operation
  );
}
