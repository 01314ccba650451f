import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { ChirpyVariables } from '../types/hono.js';
import { AuthError } from '../errors/auth-error.js';
import { StorageError } from '../errors/storage-error.js';
import { formatZodError } from './validation.js';
import { TOKEN_CACHE_CONTROL, TOKEN_PRAGMA, HEADER_CACHE_CONTROL, HEADER_PRAGMA } from '../config/constants.js';

/**
 * Map anything thrown by a handler onto the API error taxonomy
 */
export function toAuthError(err: Error): AuthError {
  if (err instanceof AuthError) {
    return err;
  }

  if (err instanceof StorageError && err.missingReference) {
    return AuthError.notFound('A referenced record does not exist.');
  }

  if (err instanceof StorageError) {
    return err.conflict
      ? AuthError.conflict('The resource already exists.')
      : AuthError.storeError(undefined, err);
  }

  if (err instanceof ZodError) {
    return AuthError.invalidRequest(formatZodError(err));
  }

  if (err instanceof HTTPException && err.status === 400) {
    return AuthError.invalidRequest(err.message);
  }

  return AuthError.serverError(
    process.env['NODE_ENV'] === 'production' ? 'An unexpected error occurred' : err.message,
    err
  );
}

/**
 * Global error handler
 *
 * Transforms errors into `{ error, error_description }` responses
 */
export const errorHandler: ErrorHandler<{ Variables: ChirpyVariables }> = (err, c) => {
  const error = toAuthError(err);

  if (error.statusCode >= 500) {
    console.error('Request failed:', err);
  }

  // Set no-cache headers for error responses
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

  return c.json(error.toJSON(), error.statusCode);
};

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<{ Variables: ChirpyVariables }> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(): MiddlewareHandler<{ Variables: ChirpyVariables }> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    // Don't log bodies or headers: they carry passwords and tokens
    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        method,
        path,
        status: c.res.status,
        duration: Date.now() - start,
      })
    );
  };
}
