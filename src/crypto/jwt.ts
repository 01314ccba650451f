import * as jose from 'jose';
import { z } from 'zod';
import type { AccessTokenClaims } from '../types/token.js';
import { AuthError } from '../errors/auth-error.js';
import { ACCESS_TOKEN_ALGORITHM, ACCESS_TOKEN_ISSUER } from '../config/constants.js';

/**
 * JWT access token signing and verification using jose library
 */

const REQUIRED_CLAIMS = ['iss', 'sub', 'iat', 'exp'];

export const userIdSchema = z.string().uuid();

export interface AccessTokenCodecOptions {
  /**
   * Shared HMAC secret. Loaded once at startup.
   */
  secret: string;
  issuer?: string;
  /**
   * Clock used for `iat`, `exp` and expiry checks
   */
  now?: () => Date;
}

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Encodes and decodes short-lived HS256 access tokens
 *
 * Instances are immutable and safe to share between concurrent requests.
 * Decoding never consults a store, so an access token stays valid until it
 * expires.
 */
export class AccessTokenCodec {
  private readonly key: Uint8Array;
  private readonly issuer: string;
  private readonly now: () => Date;

  constructor(options: AccessTokenCodecOptions) {
    if (!options.secret) {
      throw new Error('Access token secret must not be empty');
    }

    this.key = new TextEncoder().encode(options.secret);
    this.issuer = options.issuer ?? ACCESS_TOKEN_ISSUER;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Sign an access token for `userId`, valid for `ttlSeconds`
   *
   * A non-positive TTL or an expiry past the safe integer range is a
   * programming error and throws a RangeError.
   */
  async encode(userId: string, ttlSeconds: number): Promise<string> {
    if (!Number.isSafeInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new RangeError(`Access token TTL must be a positive whole number of seconds, got ${ttlSeconds}`);
    }

    const iat = toEpochSeconds(this.now());
    const exp = iat + ttlSeconds;

    if (!Number.isSafeInteger(exp)) {
      throw new RangeError('Access token expiry is out of range');
    }

    return new jose.SignJWT({})
      .setProtectedHeader({ alg: ACCESS_TOKEN_ALGORITHM, typ: 'JWT' })
      .setIssuer(this.issuer)
      .setSubject(userId)
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .sign(this.key);
  }

  /**
   * Verify a token and return its claims
   *
   * Throws `invalid_token` on a bad signature, another algorithm, a missing
   * claim, a foreign issuer, or once `exp <= now`.
   */
  async decode(token: string): Promise<AccessTokenClaims> {
    let payload: jose.JWTPayload;

    try {
      ({ payload } = await jose.jwtVerify(token, this.key, {
        algorithms: [ACCESS_TOKEN_ALGORITHM],
        issuer: this.issuer,
        requiredClaims: REQUIRED_CLAIMS,
        currentDate: this.now(),
        clockTolerance: 0,
      }));
    } catch (error) {
      throw AuthError.invalidToken('Token verification failed', error);
    }

    const { iss, sub, iat, exp } = payload;

    if (
      typeof iss !== 'string' ||
      typeof sub !== 'string' ||
      typeof iat !== 'number' ||
      typeof exp !== 'number' ||
      exp <= iat
    ) {
      throw AuthError.invalidToken('Token claims are incomplete');
    }

    return { iss, sub, iat, exp };
  }

  /**
   * Verify a token and return the user ID it was issued to
   */
  async decodeUserId(token: string): Promise<string> {
    const claims = await this.decode(token);
    const parsed = userIdSchema.safeParse(claims.sub);

    if (!parsed.success) {
      throw AuthError.invalidToken('Token subject is not a user ID');
    }

    return parsed.data;
  }
}
