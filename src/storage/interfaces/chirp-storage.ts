import type { Chirp, CreateChirpInput, ListChirpsOptions } from '../../types/chirp.js';

/**
 * Storage interface for chirps
 */
export interface IChirpStorage {
  create(input: CreateChirpInput): Promise<Chirp>;

  findById(id: string): Promise<Chirp | null>;

  /**
   * List chirps ordered by creation time, ascending unless asked otherwise
   */
  list(options?: ListChirpsOptions): Promise<Chirp[]>;

  /**
   * Delete a chirp
   * Returns false if it did not exist
   */
  delete(id: string): Promise<boolean>;
}
