import { Hono } from 'hono';
import type { ChirpyVariables } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { Platform } from '../../config/index.js';
import { AuthError } from '../../errors/auth-error.js';

export interface AdminRoutesOptions {
  storage: IStorage;
  platform: Platform;
}

/**
 * Create admin routes
 */
export function createAdminRoutes(options: AdminRoutesOptions) {
  const { storage, platform } = options;

  const router = new Hono<{ Variables: ChirpyVariables }>();

  // POST /reset: wipe users with their chirps and refresh tokens
  router.post('/reset', async (c) => {
    if (platform !== 'dev') {
      throw AuthError.forbidden('Reset is only allowed on the dev platform');
    }

    const deleted = await storage.users.deleteAll();
    console.log(JSON.stringify({ timestamp: new Date().toISOString(), event: 'reset', deletedUsers: deleted }));

    return c.json({ deleted });
  });

  return router;
}
