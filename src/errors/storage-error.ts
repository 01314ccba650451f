/**
 * Raised by storage implementations when a read or write fails
 *
 * `conflict` marks a uniqueness violation (duplicate email, duplicate
 * refresh token value). `missingReference` marks a write pointing at a row
 * that no longer exists, such as a chirp for a deleted user. Every other
 * failure is opaque to the caller.
 */
export class StorageError extends Error {
  public readonly conflict: boolean;
  public readonly missingReference: boolean;

  constructor(
    message: string,
    options?: { cause?: unknown; conflict?: boolean; missingReference?: boolean }
  ) {
    super(message);
    this.name = 'StorageError';
    this.conflict = options?.conflict ?? false;
    this.missingReference = options?.missingReference ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  static conflict(message: string, cause?: unknown): StorageError {
    return new StorageError(message, { cause, conflict: true });
  }

  static missingReference(message: string, cause?: unknown): StorageError {
    return new StorageError(message, { cause, missingReference: true });
  }
}
