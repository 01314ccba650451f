import type { User, CreateUserInput, UpdateCredentialsInput } from '../../types/user.js';
import type { IUserStorage } from '../interfaces/user-storage.js';
import { StorageError } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';

/**
 * Rows owned by a user, removed when the user is
 */
export interface UserDependentStorage {
  clear(userIds?: Set<string>): number;
}

/**
 * In-memory user storage implementation
 */
export class MemoryUserStorage implements IUserStorage {
  private users = new Map<string, User>();
  private emailIndex = new Map<string, string>(); // email -> id

  constructor(private readonly dependents: UserDependentStorage[] = []) {}

  async create(input: CreateUserInput): Promise<User> {
    if (this.emailIndex.has(input.email)) {
      throw StorageError.conflict('Email is already registered');
    }

    const now = new Date();
    const user: User = {
      id: generateId(),
      email: input.email,
      passwordHash: input.passwordHash,
      isChirpyRed: false,
      createdAt: now,
      updatedAt: now,
    };

    this.users.set(user.id, user);
    this.emailIndex.set(user.email, user.id);

    return { ...user };
  }

  async findById(id: string): Promise<User | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const id = this.emailIndex.get(email);
    if (!id) return null;
    return this.findById(id);
  }

  async updateCredentials(id: string, input: UpdateCredentialsInput): Promise<User | null> {
    const user = this.users.get(id);
    if (!user) return null;

    const owner = this.emailIndex.get(input.email);
    if (owner !== undefined && owner !== id) {
      throw StorageError.conflict('Email is already registered');
    }

    const updated: User = {
      ...user,
      email: input.email,
      passwordHash: input.passwordHash,
      updatedAt: new Date(),
    };

    this.emailIndex.delete(user.email);
    this.emailIndex.set(updated.email, id);
    this.users.set(id, updated);

    return { ...updated };
  }

  async upgradeToChirpyRed(id: string): Promise<User | null> {
    const user = this.users.get(id);
    if (!user) return null;

    const updated: User = { ...user, isChirpyRed: true, updatedAt: new Date() };
    this.users.set(id, updated);

    return { ...updated };
  }

  async deleteAll(): Promise<number> {
    const deleted = this.users.size;
    const userIds = new Set(this.users.keys());

    for (const dependent of this.dependents) {
      dependent.clear(userIds);
    }

    this.users.clear();
    this.emailIndex.clear();

    return deleted;
  }
}
