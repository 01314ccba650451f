import { eq } from 'drizzle-orm';
import type { User, CreateUserInput, UpdateCredentialsInput } from '../../../types/user.js';
import type { IUserStorage } from '../../interfaces/user-storage.js';
import { StorageError } from '../../../errors/storage-error.js';
import { users, type UserRow } from '../schema.js';
import { runQuery, type Database } from '../client.js';

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.hashedPassword,
    isChirpyRed: row.isChirpyRed,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * PostgreSQL user storage implementation
 *
 * Chirps and refresh tokens go with their user through ON DELETE CASCADE.
 */
export class PostgresUserStorage implements IUserStorage {
  constructor(private readonly db: Database) {}

  async create(input: CreateUserInput): Promise<User> {
    const [row] = await runQuery('create user', () =>
      this.db
        .insert(users)
        .values({ email: input.email, hashedPassword: input.passwordHash })
        .returning()
    );

    if (!row) {
      throw new StorageError('create user returned no row');
    }
    return rowToUser(row);
  }

  async findById(id: string): Promise<User | null> {
    const [row] = await runQuery('find user', () =>
      this.db.select().from(users).where(eq(users.id, id)).limit(1)
    );
    return row ? rowToUser(row) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const [row] = await runQuery('find user by email', () =>
      this.db.select().from(users).where(eq(users.email, email)).limit(1)
    );
    return row ? rowToUser(row) : null;
  }

  async updateCredentials(id: string, input: UpdateCredentialsInput): Promise<User | null> {
    const [row] = await runQuery('update user credentials', () =>
      this.db
        .update(users)
        .set({ email: input.email, hashedPassword: input.passwordHash, updatedAt: new Date() })
        .where(eq(users.id, id))
        .returning()
    );
    return row ? rowToUser(row) : null;
  }

  async upgradeToChirpyRed(id: string): Promise<User | null> {
    const [row] = await runQuery('upgrade user', () =>
      this.db
        .update(users)
        .set({ isChirpyRed: true, updatedAt: new Date() })
        .where(eq(users.id, id))
        .returning()
    );
    return row ? rowToUser(row) : null;
  }

  async deleteAll(): Promise<number> {
    const rows = await runQuery('delete users', () =>
      this.db.delete(users).returning({ id: users.id })
    );
    return rows.length;
  }
}
