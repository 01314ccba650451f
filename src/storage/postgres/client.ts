import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { StorageError } from '../../errors/storage-error.js';

export type Database = NodePgDatabase;

// PostgreSQL error codes
const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

let pool: pg.Pool | null = null;
let database: Database | null = null;

/**
 * Initialize the connection pool and the drizzle client
 */
export function initializeDatabase(connectionString: string): Database {
  if (database) {
    return database;
  }

  pool = new pg.Pool({ connectionString });
  database = drizzle(pool);

  return database;
}

/**
 * Close the connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    database = null;
  }
}

/**
 * SQLSTATE of the driver error, looking through wrapping errors
 */
function postgresErrorCode(error: unknown): string | undefined {
  if (error instanceof pg.DatabaseError) {
    return error.code;
  }
  if (error instanceof Error && error.cause !== undefined) {
    return postgresErrorCode(error.cause);
  }
  return undefined;
}

/**
 * Run a query, translating driver failures into `StorageError`
 */
export async function runQuery<T>(operation: string, query: () => PromiseLike<T>): Promise<T> {
  try {
    return await query();
  } catch (error) {
    switch (postgresErrorCode(error)) {
      case UNIQUE_VIOLATION:
        throw StorageError.conflict(`${operation}: duplicate key`, error);
      case FOREIGN_KEY_VIOLATION:
        throw StorageError.missingReference(`${operation}: referenced row is missing`, error);
    }
    throw new StorageError(`${operation} failed`, { cause: error });
  }
}
