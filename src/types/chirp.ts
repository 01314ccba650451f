/**
 * Stored chirp
 */
export interface Chirp {
  id: string; // UUID
  userId: string; // Author
  body: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateChirpInput {
  userId: string;
  body: string;
}

export type ChirpSortOrder = 'asc' | 'desc';

export interface ListChirpsOptions {
  authorId?: string;
  sort?: ChirpSortOrder;
}

/**
 * Chirp as returned over HTTP
 */
export interface ChirpResponse {
  id: string;
  created_at: string;
  updated_at: string;
  body: string;
  user_id: string;
}

export function toChirpResponse(chirp: Chirp): ChirpResponse {
  return {
    id: chirp.id,
    created_at: chirp.createdAt.toISOString(),
    updated_at: chirp.updatedAt.toISOString(),
    body: chirp.body,
    user_id: chirp.userId,
  };
}
