import { describe, it, expect } from 'vitest';
import pg from 'pg';
import { runQuery } from '../../storage/postgres/client.js';
import { StorageError } from '../../errors/storage-error.js';

function databaseError(code: string): pg.DatabaseError {
  const error = new pg.DatabaseError('constraint violated', 0, 'error');
  error.code = code;
  return error;
}

describe('runQuery', () => {
  it('should return the query result', async () => {
    expect(await runQuery('count users', async () => 3)).toBe(3);
  });

  it('should report a unique violation as a conflict', async () => {
    const attempt = runQuery('create user', async () => {
      throw databaseError('23505');
    });

    await expect(attempt).rejects.toBeInstanceOf(StorageError);
    await expect(attempt).rejects.toMatchObject({
      message: 'create user: duplicate key',
      conflict: true,
      missingReference: false,
    });
  });

  it('should report a foreign key violation as a missing reference', async () => {
    const attempt = runQuery('create chirp', async () => {
      throw new Error('Failed query', { cause: databaseError('23503') });
    });

    await expect(attempt).rejects.toMatchObject({
      message: 'create chirp: referenced row is missing',
      conflict: false,
      missingReference: true,
    });
  });

  it('should wrap any other failure', async () => {
    const cause = new Error('connection terminated');
    const attempt = runQuery('find user', async () => {
      throw cause;
    });

    await expect(attempt).rejects.toMatchObject({
      message: 'find user failed',
      conflict: false,
      missingReference: false,
      cause,
    });
  });
});
