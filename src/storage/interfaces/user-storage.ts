import type { User, CreateUserInput, UpdateCredentialsInput } from '../../types/user.js';

/**
 * Storage interface for user records
 *
 * Implementations throw `StorageError` on failure, with `conflict` set when
 * an email is already taken.
 */
export interface IUserStorage {
  /**
   * Create a new user with a generated ID
   */
  create(input: CreateUserInput): Promise<User>;

  /**
   * Find a user by ID
   */
  findById(id: string): Promise<User | null>;

  /**
   * Find a user by email (exact match)
   */
  findByEmail(email: string): Promise<User | null>;

  /**
   * Replace a user's email and password hash
   * Returns null if the user does not exist
   */
  updateCredentials(id: string, input: UpdateCredentialsInput): Promise<User | null>;

  /**
   * Set the Chirpy Red flag
   * Returns null if the user does not exist
   */
  upgradeToChirpyRed(id: string): Promise<User | null>;

  /**
   * Delete every user together with their chirps and refresh tokens
   */
  deleteAll(): Promise<number>;
}
