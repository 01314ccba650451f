import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { ChirpyVariables } from '../../types/hono.js';
import { toUserResponse } from '../../types/user.js';
import type { IUserStorage } from '../../storage/interfaces/index.js';
import type { AccessTokenCodec } from '../../crypto/jwt.js';
import { hashPassword } from '../../crypto/hash.js';
import { AuthError } from '../../errors/auth-error.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import { rejectInvalid } from '../../middleware/validation.js';

const credentialsSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

export interface UserRoutesOptions {
  users: IUserStorage;
  codec: AccessTokenCodec;
}

/**
 * Create user registration and credential update routes
 */
export function createUserRoutes(options: UserRoutesOptions) {
  const { users, codec } = options;

  const router = new Hono<{ Variables: ChirpyVariables }>();

  // POST /users
  router.post('/', zValidator('json', credentialsSchema, rejectInvalid), async (c) => {
    const { email, password } = c.req.valid('json');

    const user = await users.create({
      email,
      passwordHash: await hashPassword(password),
    });

    return c.json(toUserResponse(user), 201);
  });

  // PUT /users
  router.put(
    '/',
    bearerAuth({ codec }),
    zValidator('json', credentialsSchema, rejectInvalid),
    async (c) => {
      const { email, password } = c.req.valid('json');

      const user = await users.updateCredentials(c.get('userId'), {
        email,
        passwordHash: await hashPassword(password),
      });

      if (!user) {
        throw AuthError.notFound('User not found');
      }

      return c.json(toUserResponse(user));
    }
  );

  return router;
}
