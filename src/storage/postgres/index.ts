import type { IStorage } from '../interfaces/index.js';
import { initializeDatabase } from './client.js';
import { PostgresUserStorage } from './repositories/user-repository.js';
import { PostgresRefreshTokenStorage } from './repositories/token-repository.js';
import { PostgresChirpStorage } from './repositories/chirp-repository.js';

export { initializeDatabase, closeDatabase, type Database } from './client.js';
export { PostgresUserStorage } from './repositories/user-repository.js';
export { PostgresRefreshTokenStorage } from './repositories/token-repository.js';
export { PostgresChirpStorage } from './repositories/chirp-repository.js';

/**
 * Create a complete PostgreSQL storage implementation
 */
export function createPostgresStorage(connectionString: string): IStorage {
  const db = initializeDatabase(connectionString);

  return {
    users: new PostgresUserStorage(db),
    refreshTokens: new PostgresRefreshTokenStorage(db),
    chirps: new PostgresChirpStorage(db),
  };
}
