/**
 * Error taxonomy for repository bootstrap operations.
 *
 * Callers branch on `code` (or `instanceof`) to decide what is retryable:
 * a ToolingError may succeed once the tool is installed, a SigningError never
 * succeeds on retry with the same key.
 */

export type BootstrapErrorCode =
  | 'USAGE'
  | 'SIGNING'
  | 'REPOSITORY'
  | 'NOT_FOUND'
  | 'TOOLING';

/**
 * Base class for all bootstrap errors
 */
export class BootstrapError extends Error {
  public readonly code: BootstrapErrorCode;

  constructor(message: string, code: BootstrapErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'BootstrapError';
    this.code = code;
    Object.setPrototypeOf(this, BootstrapError.prototype);
  }
}

/**
 * Bad or missing parameters
 */
export class UsageError extends BootstrapError {
  constructor(message: string, cause?: unknown) {
    super(message, 'USAGE', cause);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

/**
 * Signing key missing, unreadable, in the wrong format, or rejected while signing
 */
export class SigningError extends BootstrapError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SIGNING', cause);
    this.name = 'SigningError';
    Object.setPrototypeOf(this, SigningError.prototype);
  }
}

/**
 * The version-control layer refused to create or mutate repository state
 */
export class RepositoryError extends BootstrapError {
  constructor(message: string, cause?: unknown) {
    super(message, 'REPOSITORY', cause);
    this.name = 'RepositoryError';
    Object.setPrototypeOf(this, RepositoryError.prototype);
  }
}

/**
 * No root commit exists to verify
 */
export class NotFoundError extends BootstrapError {
  constructor(message: string, cause?: unknown) {
    super(message, 'NOT_FOUND', cause);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * A check could not be executed, as opposed to executing and failing
 */
export class ToolingError extends BootstrapError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TOOLING', cause);
    this.name = 'ToolingError';
    Object.setPrototypeOf(this, ToolingError.prototype);
  }
}

export function isBootstrapError(error: unknown): error is BootstrapError {
  return error instanceof BootstrapError;
}
