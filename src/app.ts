import { Hono } from 'hono';
import type { ChirpyVariables } from './types/hono.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { Platform } from './config/index.js';
import { AccessTokenCodec } from './crypto/jwt.js';
import { SessionService } from './services/session-service.js';
import { errorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { rateLimiter } from './middleware/rate-limiter.js';
import {
  createAuthRoutes,
  createUserRoutes,
  createChirpRoutes,
  createWebhookRoutes,
} from './routes/api/index.js';
import { createAdminRoutes } from './routes/admin/index.js';
import {
  DEFAULT_RATE_LIMIT_MAX_REQUESTS,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
} from './config/constants.js';

export interface ChirpyServerOptions {
  storage: IStorage;
  /**
   * HMAC secret for access tokens
   */
  jwtSecret: string;
  /**
   * Shared key the Polka billing webhook authenticates with
   */
  polkaKey?: string;
  platform?: Platform;
  rateLimit?: {
    windowMs: number;
    maxRequests: number;
  };
  enableLogging?: boolean;
  /**
   * Clock for token issuance and expiry checks
   */
  now?: () => Date;
}

/**
 * Create the Chirpy application
 */
export function createChirpyServer(options: ChirpyServerOptions): Hono<{ Variables: ChirpyVariables }> {
  const {
    storage,
    jwtSecret,
    polkaKey,
    platform = 'prod',
    rateLimit = { windowMs: DEFAULT_RATE_LIMIT_WINDOW_MS, maxRequests: DEFAULT_RATE_LIMIT_MAX_REQUESTS },
    enableLogging = true,
    now,
  } = options;

  // Built once and shared read-only by every request
  const codec = new AccessTokenCodec({ secret: jwtSecret, now });
  const sessions = new SessionService({
    users: storage.users,
    refreshTokens: storage.refreshTokens,
    codec,
    now,
  });

  const app = new Hono<{ Variables: ChirpyVariables }>();

  // Global error handler
  app.onError(errorHandler);

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger());
  }

  // Rate limiting
  app.use('*', rateLimiter(rateLimit));

  const api = new Hono<{ Variables: ChirpyVariables }>();

  api.get('/healthz', (c) => c.text('OK'));
  api.route('/', createAuthRoutes({ sessions }));
  api.route('/users', createUserRoutes({ users: storage.users, codec }));
  api.route('/chirps', createChirpRoutes({ chirps: storage.chirps, users: storage.users, codec }));
  api.route('/', createWebhookRoutes({ users: storage.users, polkaKey }));

  app.route('/api', api);
  app.route('/admin', createAdminRoutes({ storage, platform }));

  return app;
}
