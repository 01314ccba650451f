import { and, eq, isNull } from 'drizzle-orm';
import type { RefreshTokenEntry } from '../../../types/token.js';
import type { IRefreshTokenStorage } from '../../interfaces/token-storage.js';
import { StorageError } from '../../../errors/storage-error.js';
import { refreshTokens, type RefreshTokenRow } from '../schema.js';
import { runQuery, type Database } from '../client.js';

function rowToEntry(row: RefreshTokenRow): RefreshTokenEntry {
  return {
    token: row.token,
    userId: row.userId,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    expiresAt: row.expiresAt,
    revokedAt: row.revokedAt,
  };
}

/**
 * PostgreSQL refresh token storage implementation
 */
export class PostgresRefreshTokenStorage implements IRefreshTokenStorage {
  constructor(private readonly db: Database) {}

  async create(entry: RefreshTokenEntry): Promise<RefreshTokenEntry> {
    const [row] = await runQuery('create refresh token', () =>
      this.db.insert(refreshTokens).values(entry).returning()
    );

    if (!row) {
      throw new StorageError('create refresh token returned no row');
    }
    return rowToEntry(row);
  }

  async findByValue(token: string): Promise<RefreshTokenEntry | null> {
    const [row] = await runQuery('find refresh token', () =>
      this.db.select().from(refreshTokens).where(eq(refreshTokens.token, token)).limit(1)
    );
    return row ? rowToEntry(row) : null;
  }

  async markRevoked(token: string, when: Date): Promise<RefreshTokenEntry | null> {
    // The revokedAt guard keeps the first revocation timestamp
    const [row] = await runQuery('revoke refresh token', () =>
      this.db
        .update(refreshTokens)
        .set({ revokedAt: when, updatedAt: when })
        .where(and(eq(refreshTokens.token, token), isNull(refreshTokens.revokedAt)))
        .returning()
    );

    if (row) {
      return rowToEntry(row);
    }
    return this.findByValue(token);
  }
}
