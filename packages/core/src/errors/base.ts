/**
 * Root of the lattice-tree error hierarchy
 *
 * Errors name the module and operation that raised them. `context` holds the
 * identifiers, keys or paths involved, so a logged error is enough to locate
 * the offending node.
 */

/**
 * Structured form of an error, as written to logs
 */
export interface ErrorDetails {
  name?: string | undefined;
  message: string;
  module?: string | undefined;
  operation?: string | undefined;
  context?: Record<string, unknown> | undefined;
  stack?: string | undefined;
}

export abstract class LatticeError extends Error {
  readonly module: string;
  readonly operation: string | undefined;
  readonly context: Record<string, unknown> | undefined;
  readonly timestamp = new Date();

  constructor(
    message: string,
    module: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.module = module;
    this.operation = operation;
    this.context = context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorDetails & { timestamp: string } {
    return { ...extractErrorDetails(this), timestamp: this.timestamp.toISOString() };
  }
}

export function isLatticeError(error: unknown): error is LatticeError {
  return error instanceof LatticeError;
}

/**
 * Describes any thrown value; library errors add where they came from
 */
export function extractErrorDetails(error: unknown): ErrorDetails {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }
  const details: ErrorDetails = { name: error.name, message: error.message, stack: error.stack };
  if (error instanceof LatticeError) {
    details.module = error.module;
    details.operation = error.operation;
    details.context = error.context;
  }
  return details;
}
