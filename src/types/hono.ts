/**
 * Hono context variables set by the auth middleware
 */
export interface ChirpyVariables {
  userId: string;
  bearerToken: string;
}

