import type { ZodError } from 'zod';
import { AuthError } from '../errors/auth-error.js';

/**
 * Join zod issues into one error description
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

/**
 * `zValidator` hook turning a failed parse into an `invalid_request` error
 */
export function rejectInvalid(result: { success: boolean; error?: ZodError }): void {
  if (!result.success) {
    throw AuthError.invalidRequest(result.error ? formatZodError(result.error) : 'Validation failed');
  }
}
