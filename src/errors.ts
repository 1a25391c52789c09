/**
 * Error types raised by the controller and its operations.
 */

/**
 * Thrown when no token is available. Raised before any operation runs.
 */
export class MissingCredentialError extends Error {
  constructor(
    public readonly sources: readonly string[] = ['token input', 'TOKEN environment variable'],
  ) {
    super(`No token provided. Set the ${sources.join(' or ')}.`);
    this.name = 'MissingCredentialError';
  }
}

/**
 * Thrown by the update operation after all symbols were attempted,
 * when at least one of them could not be written or uploaded.
 */
export class OperationFailedError extends Error {
  constructor(
    public readonly operation: string,
    public readonly failed: readonly string[],
  ) {
    super(`${operation} failed for ${failed.length} item(s): ${failed.join(', ')}`);
    this.name = 'OperationFailedError';
  }
}
