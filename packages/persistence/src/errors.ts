/**
 * Persistence errors
 */

/**
 * A new record collides with a live one on a field that must be unique
 */
export class SessionConflictError extends Error {
  constructor(public readonly field: 'identifier' | 'csrfToken') {
    super(`Session ${field} already in use`);
    this.name = 'SessionConflictError';
  }
}

/**
 * The storage backend failed to complete an operation
 */
export class SessionStorageError extends Error {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Session storage failed during ${operation}`, options);
    this.name = 'SessionStorageError';
  }
}
