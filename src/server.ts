import { serve } from '@hono/node-server';
import { createChirpyServer } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { createPostgresStorage, closeDatabase } from './storage/postgres/index.js';
import { getConfig } from './config/index.js';
import type { IStorage } from './storage/interfaces/index.js';

// Load configuration
const config = getConfig();

if (!config.secrets.jwtSecret) {
  throw new Error('JWT_SECRET (or JWT_SECRET_FILE) must be set');
}

if (!config.secrets.polkaKey) {
  console.warn('POLKA_KEY is not set: every webhook call will be rejected');
}

// Create storage based on environment
let storage: IStorage;

if (config.database.url) {
  console.log('Using PostgreSQL storage');
  storage = createPostgresStorage(config.database.url);
} else {
  console.log('Using in-memory storage (no DATABASE_URL configured)');
  storage = createMemoryStorage();
}

const app = createChirpyServer({
  storage,
  jwtSecret: config.secrets.jwtSecret,
  polkaKey: config.secrets.polkaKey,
  platform: config.server.platform,
  rateLimit: config.rateLimit,
  enableLogging: config.server.nodeEnv !== 'test',
});

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    console.log(`Chirpy running at http://${info.address}:${info.port} (platform: ${config.server.platform})`);
    if (!config.database.url) {
      console.log('Note: Running with in-memory storage. Data will be lost on restart.');
    }
  }
);

function shutdown(signal: string): void {
  console.log(`Received ${signal}, shutting down`);
  server.close();
  closeDatabase().then(
    () => process.exit(0),
    (error: unknown) => {
      console.error('Failed to close database:', error);
      process.exit(1);
    }
  );
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
