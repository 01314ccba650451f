export { createAuthRoutes, type AuthRoutesOptions } from './auth.js';
export { createUserRoutes, type UserRoutesOptions } from './users.js';
export { createChirpRoutes, type ChirpRoutesOptions } from './chirps.js';
export { createWebhookRoutes, type WebhookRoutesOptions } from './webhooks.js';
