export * from './user-storage.js';
export * from './token-storage.js';
export * from './chirp-storage.js';

import type { IUserStorage } from './user-storage.js';
import type { IRefreshTokenStorage } from './token-storage.js';
import type { IChirpStorage } from './chirp-storage.js';

/**
 * Complete storage interface for the Chirpy server
 */
export interface IStorage {
  users: IUserStorage;
  refreshTokens: IRefreshTokenStorage;
  chirps: IChirpStorage;
}
