import type { RefreshTokenEntry } from '../../types/token.js';

/**
 * Storage interface for refresh token management
 *
 * Each call must be atomic for the row it touches: a lookup racing a
 * revocation sees the entry either before or after it, never half-written.
 */
export interface IRefreshTokenStorage {
  /**
   * Persist a new entry
   * Throws a conflicting `StorageError` if the token value already exists;
   * an existing entry is never overwritten.
   */
  create(entry: RefreshTokenEntry): Promise<RefreshTokenEntry>;

  /**
   * Find an entry by its token value
   */
  findByValue(token: string): Promise<RefreshTokenEntry | null>;

  /**
   * Stamp `revokedAt` and `updatedAt` with `when`, only if the entry is not
   * already revoked. Returns the entry as stored afterwards, or null if the
   * token does not exist.
   */
  markRevoked(token: string, when: Date): Promise<RefreshTokenEntry | null>;
}
