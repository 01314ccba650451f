import type { RefreshTokenEntry } from '../types/token.js';
import type { IRefreshTokenStorage } from '../storage/interfaces/token-storage.js';
import { StorageError } from '../errors/storage-error.js';
import { generateRefreshToken } from '../crypto/random.js';
import { DEFAULT_REFRESH_TOKEN_TTL, REFRESH_TOKEN_MAX_ATTEMPTS } from '../config/constants.js';

export interface RefreshTokenIssuerOptions {
  now?: () => Date;
  ttlSeconds?: number;
  maxAttempts?: number;
  generateToken?: () => string;
}

/**
 * Mints refresh tokens and persists them
 */
export class RefreshTokenIssuer {
  private readonly now: () => Date;
  private readonly ttlSeconds: number;
  private readonly maxAttempts: number;
  private readonly generateToken: () => string;

  constructor(options: RefreshTokenIssuerOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_REFRESH_TOKEN_TTL;
    this.maxAttempts = options.maxAttempts ?? REFRESH_TOKEN_MAX_ATTEMPTS;
    this.generateToken = options.generateToken ?? (() => generateRefreshToken());
  }

  /**
   * Issue a new refresh token for `userId`
   *
   * A duplicate token value is retried with a fresh one. Any other store
   * failure, or running out of attempts, rejects with a `StorageError`.
   */
  async issue(storage: IRefreshTokenStorage, userId: string): Promise<RefreshTokenEntry> {
    let lastConflict: StorageError | undefined;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const now = this.now();
      const entry: RefreshTokenEntry = {
        token: this.generateToken(),
        userId,
        createdAt: now,
        updatedAt: now,
        expiresAt: new Date(now.getTime() + this.ttlSeconds * 1000),
        revokedAt: null,
      };

      try {
        return await storage.create(entry);
      } catch (error) {
        if (error instanceof StorageError && error.conflict) {
          lastConflict = error;
          continue;
        }
        throw error;
      }
    }

    throw new StorageError(
      `Could not allocate a unique refresh token after ${this.maxAttempts} attempts`,
      { cause: lastConflict }
    );
  }
}
