import {
  type AuthErrorCode,
  type ErrorStatusCode,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_AUTHENTICATION_FAILED,
  ERROR_INVALID_TOKEN,
  ERROR_UNAUTHORIZED,
  ERROR_MALFORMED_HEADER,
  ERROR_INVALID_REQUEST,
  ERROR_NOT_FOUND,
  ERROR_FORBIDDEN,
  ERROR_CONFLICT,
  ERROR_RATE_LIMITED,
  ERROR_STORE_ERROR,
  ERROR_SERVER_ERROR,
} from './error-codes.js';

/**
 * JSON error body returned by every endpoint
 */
export interface AuthErrorResponse {
  error: AuthErrorCode;
  error_description?: string;
}

/**
 * API error class
 *
 * Every failure the authentication core and the routes built on it can
 * signal to a caller. The global error handler turns these into responses.
 */
export class AuthError extends Error {
  public readonly code: AuthErrorCode;
  public readonly statusCode: ErrorStatusCode;
  public readonly description: string;

  constructor(code: AuthErrorCode, description?: string, options?: { cause?: unknown }) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'AuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): AuthErrorResponse {
    const response: AuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    return response;
  }

  // Factory methods for common errors

  /**
   * Bad email or bad password. Callers never learn which.
   */
  static authenticationFailed(): AuthError {
    return new AuthError(ERROR_AUTHENTICATION_FAILED);
  }

  static invalidToken(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_INVALID_TOKEN, description, { cause });
  }

  static unauthorized(description?: string): AuthError {
    return new AuthError(ERROR_UNAUTHORIZED, description);
  }

  static malformedHeader(description?: string): AuthError {
    return new AuthError(ERROR_MALFORMED_HEADER, description);
  }

  static invalidRequest(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_REQUEST, description);
  }

  static notFound(description?: string): AuthError {
    return new AuthError(ERROR_NOT_FOUND, description);
  }

  static forbidden(description?: string): AuthError {
    return new AuthError(ERROR_FORBIDDEN, description);
  }

  static conflict(description?: string): AuthError {
    return new AuthError(ERROR_CONFLICT, description);
  }

  static rateLimited(description?: string): AuthError {
    return new AuthError(ERROR_RATE_LIMITED, description);
  }

  static storeError(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_STORE_ERROR, description, { cause });
  }

  static serverError(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_SERVER_ERROR, description, { cause });
  }
}
