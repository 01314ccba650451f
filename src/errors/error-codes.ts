/**
 * Chirpy API error codes
 */

// Authentication and session errors
export const ERROR_AUTHENTICATION_FAILED = 'authentication_failed' as const;
export const ERROR_INVALID_TOKEN = 'invalid_token' as const;
export const ERROR_UNAUTHORIZED = 'unauthorized' as const;
export const ERROR_MALFORMED_HEADER = 'malformed_header' as const;

// Request errors
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_NOT_FOUND = 'not_found' as const;
export const ERROR_FORBIDDEN = 'forbidden' as const;
export const ERROR_CONFLICT = 'conflict' as const;
export const ERROR_RATE_LIMITED = 'rate_limited' as const;

// Server errors
export const ERROR_STORE_ERROR = 'store_error' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;

/**
 * All API error codes
 */
export type AuthErrorCode =
  | typeof ERROR_AUTHENTICATION_FAILED
  | typeof ERROR_INVALID_TOKEN
  | typeof ERROR_UNAUTHORIZED
  | typeof ERROR_MALFORMED_HEADER
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_NOT_FOUND
  | typeof ERROR_FORBIDDEN
  | typeof ERROR_CONFLICT
  | typeof ERROR_RATE_LIMITED
  | typeof ERROR_STORE_ERROR
  | typeof ERROR_SERVER_ERROR;

/**
 * Status codes the API responds with
 */
export type ErrorStatusCode = 400 | 401 | 403 | 404 | 409 | 429 | 500;

/**
 * HTTP status codes for API errors
 */
export const ERROR_STATUS_CODES: Record<AuthErrorCode, ErrorStatusCode> = {
  [ERROR_AUTHENTICATION_FAILED]: 401,
  [ERROR_INVALID_TOKEN]: 401,
  [ERROR_UNAUTHORIZED]: 401,
  [ERROR_MALFORMED_HEADER]: 401,
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_NOT_FOUND]: 404,
  [ERROR_FORBIDDEN]: 403,
  [ERROR_CONFLICT]: 409,
  [ERROR_RATE_LIMITED]: 429,
  [ERROR_STORE_ERROR]: 500,
  [ERROR_SERVER_ERROR]: 500,
};

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<AuthErrorCode, string> = {
  [ERROR_AUTHENTICATION_FAILED]: 'Incorrect email or password',
  [ERROR_INVALID_TOKEN]: 'The access token provided is expired, malformed, or invalid.',
  [ERROR_UNAUTHORIZED]: 'The credential provided is missing, expired, or revoked.',
  [ERROR_MALFORMED_HEADER]: 'The Authorization header is missing or malformed.',
  [ERROR_INVALID_REQUEST]: 'The request is missing a required parameter or is otherwise malformed.',
  [ERROR_NOT_FOUND]: 'The requested resource does not exist.',
  [ERROR_FORBIDDEN]: 'You are not allowed to perform this action.',
  [ERROR_CONFLICT]: 'The resource already exists.',
  [ERROR_RATE_LIMITED]: 'Too many requests.',
  [ERROR_STORE_ERROR]: 'The data store failed to complete the request.',
  [ERROR_SERVER_ERROR]: 'The server encountered an unexpected condition.',
};
