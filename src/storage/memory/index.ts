import type { IStorage } from '../interfaces/index.js';
import { MemoryUserStorage } from './user-storage.js';
import { MemoryRefreshTokenStorage } from './token-storage.js';
import { MemoryChirpStorage } from './chirp-storage.js';

export { MemoryUserStorage } from './user-storage.js';
export { MemoryRefreshTokenStorage } from './token-storage.js';
export { MemoryChirpStorage } from './chirp-storage.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(): IStorage {
  const refreshTokens = new MemoryRefreshTokenStorage();
  const chirps = new MemoryChirpStorage();

  return {
    users: new MemoryUserStorage([refreshTokens, chirps]),
    refreshTokens,
    chirps,
  };
}
