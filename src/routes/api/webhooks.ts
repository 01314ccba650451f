import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { ChirpyVariables } from '../../types/hono.js';
import type { IUserStorage } from '../../storage/interfaces/index.js';
import { userIdSchema } from '../../crypto/jwt.js';
import { AuthError } from '../../errors/auth-error.js';
import { apiKeyAuth } from '../../middleware/bearer-auth.js';
import { rejectInvalid } from '../../middleware/validation.js';
import { POLKA_EVENT_USER_UPGRADED } from '../../config/constants.js';

const polkaEventSchema = z.object({
  event: z.string(),
  data: z
    .object({
      user_id: z.string().optional(),
    })
    .optional(),
});

export interface WebhookRoutesOptions {
  users: IUserStorage;
  polkaKey: string | undefined;
}

/**
 * Create billing webhook routes
 */
export function createWebhookRoutes(options: WebhookRoutesOptions) {
  const { users, polkaKey } = options;

  const router = new Hono<{ Variables: ChirpyVariables }>();

  // POST /polka/webhooks
  router.post(
    '/polka/webhooks',
    apiKeyAuth({ apiKey: polkaKey }),
    zValidator('json', polkaEventSchema, rejectInvalid),
    async (c) => {
      const { event, data } = c.req.valid('json');

      // Other events are acknowledged so Polka stops retrying them
      if (event !== POLKA_EVENT_USER_UPGRADED) {
        return c.body(null, 204);
      }

      if (!data?.user_id) {
        throw AuthError.invalidRequest('Missing data.user_id');
      }

      const userId = userIdSchema.safeParse(data.user_id);
      const user = userId.success ? await users.upgradeToChirpyRed(userId.data) : null;

      if (!user) {
        throw AuthError.notFound('User not found');
      }

      return c.body(null, 204);
    }
  );

  return router;
}
