/**
 * Chirpy constants
 */

// Access token claims
export const ACCESS_TOKEN_ISSUER = 'chirpy' as const;
export const ACCESS_TOKEN_ALGORITHM = 'HS256' as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour, also the floor for login
export const DEFAULT_REFRESH_TOKEN_TTL = 5184000; // 60 days
export const MAX_LOGIN_ACCESS_TOKEN_TTL = DEFAULT_REFRESH_TOKEN_TTL; // longest a caller may ask for

// Token lengths
export const REFRESH_TOKEN_LENGTH = 32; // bytes, rendered as 64 hex chars
export const REFRESH_TOKEN_MAX_ATTEMPTS = 3;

// Password hashing (scrypt)
export const SCRYPT_COST = 16384; // CPU/memory cost
export const SCRYPT_BLOCK_SIZE = 8;
export const SCRYPT_PARALLELIZATION = 1;
export const SCRYPT_KEY_LENGTH = 64;
export const SCRYPT_SALT_LENGTH = 16;

// Chirps
export const MAX_CHIRP_LENGTH = 140; // UTF-8 bytes

// Webhooks
export const POLKA_EVENT_USER_UPGRADED = 'user.upgraded' as const;

// Rate limiting defaults
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60000; // 1 minute
export const DEFAULT_RATE_LIMIT_MAX_REQUESTS = 100;

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization';
export const HEADER_WWW_AUTHENTICATE = 'WWW-Authenticate';
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Authorization schemes
export const AUTH_SCHEME_BEARER = 'Bearer' as const;
export const AUTH_SCHEME_API_KEY = 'ApiKey' as const;

// Cache control for token responses
export const TOKEN_CACHE_CONTROL = 'no-store';
export const TOKEN_PRAGMA = 'no-cache';
