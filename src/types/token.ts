import type { User } from './user.js';

/**
 * JWT Access Token Payload
 *
 * Never persisted. Times are seconds since the epoch.
 */
export interface AccessTokenClaims {
  iss: string; // Issuer
  sub: string; // Subject (user ID)
  iat: number; // Issued at
  exp: number; // Expiration time
}

/**
 * Refresh Token (stored)
 *
 * The token value is the primary key. An entry is usable only while
 * `now < expiresAt` and it has not been revoked.
 */
export interface RefreshTokenEntry {
  token: string;
  userId: string;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
  revokedAt: Date | null;
}

/**
 * Result of a successful login
 */
export interface LoginResult {
  user: User;
  accessToken: string;
  refreshToken: RefreshTokenEntry;
}

/**
 * Login response body: user fields plus both tokens
 */
export interface LoginResponse {
  id: string;
  created_at: string;
  updated_at: string;
  email: string;
  is_chirpy_red: boolean;
  token: string;
  refresh_token: string;
}

/**
 * Refresh response body
 */
export interface RefreshResponse {
  token: string;
}
