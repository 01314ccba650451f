import { asc, desc, eq } from 'drizzle-orm';
import type { Chirp, CreateChirpInput, ListChirpsOptions } from '../../../types/chirp.js';
import type { IChirpStorage } from '../../interfaces/chirp-storage.js';
import { StorageError } from '../../../errors/storage-error.js';
import { chirps, type ChirpRow } from '../schema.js';
import { runQuery, type Database } from '../client.js';

function rowToChirp(row: ChirpRow): Chirp {
  return {
    id: row.id,
    userId: row.userId,
    body: row.body,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * PostgreSQL chirp storage implementation
 */
export class PostgresChirpStorage implements IChirpStorage {
  constructor(private readonly db: Database) {}

  async create(input: CreateChirpInput): Promise<Chirp> {
    const [row] = await runQuery('create chirp', () =>
      this.db.insert(chirps).values({ userId: input.userId, body: input.body }).returning()
    );

    if (!row) {
      throw new StorageError('create chirp returned no row');
    }
    return rowToChirp(row);
  }

  async findById(id: string): Promise<Chirp | null> {
    const [row] = await runQuery('find chirp', () =>
      this.db.select().from(chirps).where(eq(chirps.id, id)).limit(1)
    );
    return row ? rowToChirp(row) : null;
  }

  async list(options: ListChirpsOptions = {}): Promise<Chirp[]> {
    const { authorId, sort = 'asc' } = options;
    const order = sort === 'desc' ? desc(chirps.createdAt) : asc(chirps.createdAt);

    const rows = await runQuery('list chirps', () =>
      this.db
        .select()
        .from(chirps)
        .where(authorId ? eq(chirps.userId, authorId) : undefined)
        .orderBy(order)
    );
    return rows.map(rowToChirp);
  }

  async delete(id: string): Promise<boolean> {
    const rows = await runQuery('delete chirp', () =>
      this.db.delete(chirps).where(eq(chirps.id, id)).returning({ id: chirps.id })
    );
    return rows.length > 0;
  }
}
