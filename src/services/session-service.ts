import type { LoginResult } from '../types/token.js';
import type { IUserStorage } from '../storage/interfaces/user-storage.js';
import type { IRefreshTokenStorage } from '../storage/interfaces/token-storage.js';
import type { AccessTokenCodec } from '../crypto/jwt.js';
import { AuthError } from '../errors/auth-error.js';
import { verifyPassword, getDummyPasswordHash } from '../crypto/hash.js';
import { RefreshTokenIssuer } from './refresh-token-issuer.js';
import { DEFAULT_ACCESS_TOKEN_TTL } from '../config/constants.js';

export interface SessionServiceOptions {
  users: Pick<IUserStorage, 'findByEmail'>;
  refreshTokens: IRefreshTokenStorage;
  codec: AccessTokenCodec;
  issuer?: RefreshTokenIssuer;
  now?: () => Date;
  /**
   * Hash verified against for unknown emails
   */
  dummyPasswordHash?: () => Promise<string>;
}

/**
 * Access token lifetime for a login
 *
 * Defaults to one hour; shorter requests are raised to one hour, longer
 * ones are honoured.
 */
export function effectiveAccessTokenTtl(requestedSeconds?: number): number {
  return Math.max(requestedSeconds ?? DEFAULT_ACCESS_TOKEN_TTL, DEFAULT_ACCESS_TOKEN_TTL);
}

/**
 * Login, refresh and revocation
 *
 * A refresh token is Active until it expires or is revoked; both end states
 * are final for that token value.
 */
export class SessionService {
  private readonly users: Pick<IUserStorage, 'findByEmail'>;
  private readonly refreshTokens: IRefreshTokenStorage;
  private readonly codec: AccessTokenCodec;
  private readonly issuer: RefreshTokenIssuer;
  private readonly now: () => Date;
  private readonly dummyPasswordHash: () => Promise<string>;

  constructor(options: SessionServiceOptions) {
    this.users = options.users;
    this.refreshTokens = options.refreshTokens;
    this.codec = options.codec;
    this.now = options.now ?? (() => new Date());
    this.issuer = options.issuer ?? new RefreshTokenIssuer({ now: this.now });
    this.dummyPasswordHash = options.dummyPasswordHash ?? getDummyPasswordHash;

    // Computed up front so the first unknown-email login is not slower
    this.dummyPasswordHash().catch((error: unknown) => {
      console.error('Failed to precompute dummy password hash:', error);
    });
  }

  /**
   * Exchange email and password for an access token and a refresh token
   *
   * Unknown email and wrong password fail identically. The refresh token is
   * persisted last, so a failed login leaves nothing behind.
   */
  async login(email: string, password: string, expiresInSeconds?: number): Promise<LoginResult> {
    const user = await this.users.findByEmail(email);

    // Unknown users are checked against a dummy hash so both paths cost the same
    const storedHash = user?.passwordHash ?? (await this.dummyPasswordHash());
    const verified = await verifyPassword(storedHash, password);

    if (!user || !verified) {
      throw AuthError.authenticationFailed();
    }

    const accessToken = await this.codec.encode(user.id, effectiveAccessTokenTtl(expiresInSeconds));
    const refreshToken = await this.issuer.issue(this.refreshTokens, user.id);

    return { user, accessToken, refreshToken };
  }

  /**
   * Mint a fresh one-hour access token from an active refresh token
   *
   * The refresh token itself is neither rotated nor extended.
   */
  async refresh(token: string): Promise<string> {
    const entry = await this.refreshTokens.findByValue(token);
    const now = this.now().getTime();

    if (!entry) {
      throw AuthError.unauthorized('Refresh token not found');
    }

    if (now >= entry.expiresAt.getTime()) {
      throw AuthError.unauthorized('Refresh token has expired');
    }

    if (entry.revokedAt && entry.revokedAt.getTime() <= now) {
      throw AuthError.unauthorized('Refresh token has been revoked');
    }

    return this.codec.encode(entry.userId, DEFAULT_ACCESS_TOKEN_TTL);
  }

  /**
   * Revoke a refresh token
   *
   * Revoking an already revoked token succeeds and keeps the original
   * revocation time.
   */
  async revoke(token: string): Promise<void> {
    const revoked = await this.refreshTokens.markRevoked(token, this.now());

    if (!revoked) {
      throw AuthError.notFound('Refresh token not found');
    }
  }
}
