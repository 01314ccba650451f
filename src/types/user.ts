/**
 * Stored user record
 *
 * Owned by the user store. The session core only reads `id`, `email`
 * and `passwordHash`.
 */
export interface User {
  id: string; // UUID
  email: string;
  passwordHash: string;
  isChirpyRed: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * User creation input (password already hashed)
 */
export interface CreateUserInput {
  email: string;
  passwordHash: string;
}

/**
 * Credential update input (password already hashed)
 */
export interface UpdateCredentialsInput {
  email: string;
  passwordHash: string;
}

/**
 * User as returned over HTTP. Never carries the password hash.
 */
export interface UserResponse {
  id: string;
  created_at: string;
  updated_at: string;
  email: string;
  is_chirpy_red: boolean;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
    email: user.email,
    is_chirpy_red: user.isChirpyRed,
  };
}
