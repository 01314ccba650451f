import type { Chirp, CreateChirpInput, ListChirpsOptions } from '../../types/chirp.js';
import type { IChirpStorage } from '../interfaces/chirp-storage.js';
import { generateId } from '../../crypto/random.js';

interface StoredChirp {
  chirp: Chirp;
  sequence: number; // insertion order, breaks createdAt ties
}

/**
 * In-memory chirp storage implementation
 */
export class MemoryChirpStorage implements IChirpStorage {
  private chirps = new Map<string, StoredChirp>();
  private sequence = 0;

  async create(input: CreateChirpInput): Promise<Chirp> {
    const now = new Date();
    const chirp: Chirp = {
      id: generateId(),
      userId: input.userId,
      body: input.body,
      createdAt: now,
      updatedAt: now,
    };

    this.chirps.set(chirp.id, { chirp, sequence: this.sequence++ });
    return { ...chirp };
  }

  async findById(id: string): Promise<Chirp | null> {
    const stored = this.chirps.get(id);
    return stored ? { ...stored.chirp } : null;
  }

  async list(options: ListChirpsOptions = {}): Promise<Chirp[]> {
    const { authorId, sort = 'asc' } = options;
    const direction = sort === 'desc' ? -1 : 1;

    return [...this.chirps.values()]
      .filter((stored) => !authorId || stored.chirp.userId === authorId)
      .sort(
        (a, b) =>
          direction *
          (a.chirp.createdAt.getTime() - b.chirp.createdAt.getTime() || a.sequence - b.sequence)
      )
      .map((stored) => ({ ...stored.chirp }));
  }

  async delete(id: string): Promise<boolean> {
    return this.chirps.delete(id);
  }

  /**
   * Remove chirps written by the given users, or all chirps
   */
  clear(userIds?: Set<string>): number {
    let deleted = 0;
    for (const [id, stored] of this.chirps) {
      if (!userIds || userIds.has(stored.chirp.userId)) {
        this.chirps.delete(id);
        deleted++;
      }
    }
    return deleted;
  }
}
