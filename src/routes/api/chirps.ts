import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { ChirpyVariables } from '../../types/hono.js';
import { toChirpResponse } from '../../types/chirp.js';
import type { IChirpStorage, IUserStorage } from '../../storage/interfaces/index.js';
import type { AccessTokenCodec } from '../../crypto/jwt.js';
import { AuthError } from '../../errors/auth-error.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import { rejectInvalid } from '../../middleware/validation.js';
import { MAX_CHIRP_LENGTH } from '../../config/constants.js';

const createChirpSchema = z.object({
  // Measured in UTF-8 bytes
  body: z
    .string()
    .min(1)
    .refine((body) => Buffer.byteLength(body, 'utf8') <= MAX_CHIRP_LENGTH, 'Chirp is too long'),
});

const listChirpsSchema = z.object({
  author_id: z.string().uuid().optional(),
  sort: z.enum(['asc', 'desc']).optional(),
});

const chirpParamsSchema = z.object({
  chirpID: z.string().uuid(),
});

export interface ChirpRoutesOptions {
  chirps: IChirpStorage;
  users: Pick<IUserStorage, 'findById'>;
  codec: AccessTokenCodec;
}

/**
 * Create chirp routes
 */
export function createChirpRoutes(options: ChirpRoutesOptions) {
  const { chirps, users, codec } = options;

  const router = new Hono<{ Variables: ChirpyVariables }>();

  // POST /chirps
  router.post(
    '/',
    bearerAuth({ codec }),
    zValidator('json', createChirpSchema, rejectInvalid),
    async (c) => {
      const { body } = c.req.valid('json');
      const userId = c.get('userId');

      // The access token outlives a deleted user
      if (!(await users.findById(userId))) {
        throw AuthError.notFound('User not found');
      }

      const chirp = await chirps.create({ userId, body });
      return c.json(toChirpResponse(chirp), 201);
    }
  );

  // GET /chirps
  router.get('/', zValidator('query', listChirpsSchema, rejectInvalid), async (c) => {
    const { author_id, sort } = c.req.valid('query');
    const list = await chirps.list({ authorId: author_id, sort });
    return c.json(list.map(toChirpResponse));
  });

  // GET /chirps/:chirpID
  router.get('/:chirpID', zValidator('param', chirpParamsSchema, rejectInvalid), async (c) => {
    const { chirpID } = c.req.valid('param');
    const chirp = await chirps.findById(chirpID);

    if (!chirp) {
      throw AuthError.notFound('Chirp not found');
    }

    return c.json(toChirpResponse(chirp));
  });

  // DELETE /chirps/:chirpID
  router.delete(
    '/:chirpID',
    bearerAuth({ codec }),
    zValidator('param', chirpParamsSchema, rejectInvalid),
    async (c) => {
      const { chirpID } = c.req.valid('param');
      const chirp = await chirps.findById(chirpID);

      if (!chirp) {
        throw AuthError.notFound('Chirp not found');
      }

      if (chirp.userId !== c.get('userId')) {
        throw AuthError.forbidden('Only the author can delete a chirp');
      }

      await chirps.delete(chirpID);
      return c.body(null, 204);
    }
  );

  return router;
}
