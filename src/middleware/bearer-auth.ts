import type { MiddlewareHandler } from 'hono';
import type { ChirpyVariables } from '../types/hono.js';
import type { AccessTokenCodec } from '../crypto/jwt.js';
import { AuthError } from '../errors/auth-error.js';
import { constantTimeCompare } from '../crypto/hash.js';
import {
  AUTH_SCHEME_API_KEY,
  AUTH_SCHEME_BEARER,
  HEADER_AUTHORIZATION,
  HEADER_WWW_AUTHENTICATE,
} from '../config/constants.js';

/**
 * Read `Authorization: <scheme> <credential>` and return the credential
 */
function extractCredential(headers: Headers, scheme: string): string {
  const authHeader = headers.get(HEADER_AUTHORIZATION);

  if (authHeader === null) {
    throw AuthError.malformedHeader('Missing authorization header');
  }

  const prefix = `${scheme} `;
  if (!authHeader.startsWith(prefix)) {
    throw AuthError.malformedHeader(`Authorization header must use the ${scheme} scheme`);
  }

  const credential = authHeader.slice(prefix.length);
  if (credential.length === 0) {
    throw AuthError.malformedHeader('Authorization header carries no credential');
  }

  return credential;
}

/**
 * Extract bearer token from Authorization header
 *
 * No verification happens here; access tokens go to the codec and refresh
 * tokens to the session service.
 */
export function extractBearer(headers: Headers): string {
  return extractCredential(headers, AUTH_SCHEME_BEARER);
}

/**
 * Extract API key from Authorization header (`ApiKey <key>`)
 */
export function extractApiKey(headers: Headers): string {
  return extractCredential(headers, AUTH_SCHEME_API_KEY);
}

export interface BearerAuthOptions {
  codec: AccessTokenCodec;
}

/**
 * Middleware to validate bearer access tokens
 *
 * Sets `userId` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<{
  Variables: ChirpyVariables;
}> {
  const { codec } = options;

  return async (c, next) => {
    try {
      const token = extractBearer(c.req.raw.headers);
      c.set('userId', await codec.decodeUserId(token));
    } catch (error) {
      c.header(HEADER_WWW_AUTHENTICATE, `${AUTH_SCHEME_BEARER} error="invalid_token"`);
      throw error;
    }

    await next();
  };
}

/**
 * Middleware that only extracts the bearer credential
 *
 * Used by the refresh and revoke endpoints, whose bearer is an opaque
 * refresh token. Sets `bearerToken` in context variables.
 */
export function bearerToken(): MiddlewareHandler<{ Variables: ChirpyVariables }> {
  return async (c, next) => {
    c.set('bearerToken', extractBearer(c.req.raw.headers));
    await next();
  };
}

export interface ApiKeyAuthOptions {
  /**
   * Shared secret. Every request is rejected when it is not configured.
   */
  apiKey: string | undefined;
}

/**
 * Middleware authenticating a caller by a static shared API key
 */
export function apiKeyAuth(options: ApiKeyAuthOptions): MiddlewareHandler<{
  Variables: ChirpyVariables;
}> {
  const { apiKey } = options;

  return async (c, next) => {
    const providedKey = extractApiKey(c.req.raw.headers);

    if (!apiKey || !constantTimeCompare(providedKey, apiKey)) {
      throw AuthError.unauthorized('Invalid API key');
    }

    await next();
  };
}
