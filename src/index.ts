// Export for programmatic use
export { createChirpyServer, type ChirpyServerOptions } from './app.js';
export { SessionService, effectiveAccessTokenTtl } from './services/session-service.js';
export { RefreshTokenIssuer } from './services/refresh-token-issuer.js';
export { extractBearer, extractApiKey, bearerAuth, bearerToken, apiKeyAuth } from './middleware/bearer-auth.js';
export { createMemoryStorage } from './storage/memory/index.js';
export { createPostgresStorage, closeDatabase } from './storage/postgres/index.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './crypto/index.js';
