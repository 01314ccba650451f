import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { ChirpyVariables } from '../../types/hono.js';
import type { LoginResponse, RefreshResponse } from '../../types/token.js';
import { toUserResponse } from '../../types/user.js';
import type { SessionService } from '../../services/session-service.js';
import { bearerToken } from '../../middleware/bearer-auth.js';
import { rejectInvalid } from '../../middleware/validation.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  MAX_LOGIN_ACCESS_TOKEN_TTL,
} from '../../config/constants.js';

const loginSchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
  // Values under an hour are raised by the session service
  expires_in_seconds: z.number().int().max(MAX_LOGIN_ACCESS_TOKEN_TTL).optional(),
});

export interface AuthRoutesOptions {
  sessions: SessionService;
}

/**
 * Create login, refresh and revoke routes
 */
export function createAuthRoutes(options: AuthRoutesOptions) {
  const { sessions } = options;

  const router = new Hono<{ Variables: ChirpyVariables }>();

  // POST /login
  router.post('/login', zValidator('json', loginSchema, rejectInvalid), async (c) => {
    const { email, password, expires_in_seconds } = c.req.valid('json');

    const { user, accessToken, refreshToken } = await sessions.login(
      email,
      password,
      expires_in_seconds
    );

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const response: LoginResponse = {
      ...toUserResponse(user),
      token: accessToken,
      refresh_token: refreshToken.token,
    };

    return c.json(response);
  });

  // POST /refresh
  router.post('/refresh', bearerToken(), async (c) => {
    const token = await sessions.refresh(c.get('bearerToken'));

    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const response: RefreshResponse = { token };
    return c.json(response);
  });

  // POST /revoke
  router.post('/revoke', bearerToken(), async (c) => {
    await sessions.revoke(c.get('bearerToken'));
    return c.body(null, 204);
  });

  return router;
}
