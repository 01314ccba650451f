import type { RefreshTokenEntry } from '../../types/token.js';
import type { IRefreshTokenStorage } from '../interfaces/token-storage.js';
import { StorageError } from '../../errors/storage-error.js';

/**
 * In-memory refresh token storage implementation
 */
export class MemoryRefreshTokenStorage implements IRefreshTokenStorage {
  private tokens = new Map<string, RefreshTokenEntry>();

  async create(entry: RefreshTokenEntry): Promise<RefreshTokenEntry> {
    if (this.tokens.has(entry.token)) {
      throw StorageError.conflict('Refresh token already exists');
    }

    this.tokens.set(entry.token, { ...entry });
    return { ...entry };
  }

  async findByValue(token: string): Promise<RefreshTokenEntry | null> {
    const entry = this.tokens.get(token);
    return entry ? { ...entry } : null;
  }

  async markRevoked(token: string, when: Date): Promise<RefreshTokenEntry | null> {
    const entry = this.tokens.get(token);
    if (!entry) return null;

    if (!entry.revokedAt) {
      const revoked = { ...entry, revokedAt: when, updatedAt: when };
      this.tokens.set(token, revoked);
      return { ...revoked };
    }

    return { ...entry };
  }

  /**
   * Remove tokens owned by the given users, or all tokens
   */
  clear(userIds?: Set<string>): number {
    let deleted = 0;
    for (const [token, entry] of this.tokens) {
      if (!userIds || userIds.has(entry.userId)) {
        this.tokens.delete(token);
        deleted++;
      }
    }
    return deleted;
  }
}
