import { createHash, timingSafeEqual, randomBytes, scrypt as scryptCallback } from 'node:crypto';
import {
  SCRYPT_COST,
  SCRYPT_BLOCK_SIZE,
  SCRYPT_PARALLELIZATION,
  SCRYPT_KEY_LENGTH,
  SCRYPT_SALT_LENGTH,
} from '../config/constants.js';

interface ScryptParams {
  N: number;
  r: number;
  p: number;
}

/**
 * Promisified scrypt function
 */
function scryptAsync(
  password: string,
  salt: Buffer,
  keyLength: number,
  options: ScryptParams
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

/**
 * Hash a value using SHA-256
 */
export function sha256(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Compare two strings in constant time to prevent timing attacks
 *
 * Both sides are digested first so the comparison does not leak length.
 */
export function constantTimeCompare(a: string, b: string): boolean {
  return timingSafeEqual(sha256(a), sha256(b));
}

/**
 * Hash a password using scrypt
 * Returns format: $scrypt$N$r$p$salt$hash
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SCRYPT_SALT_LENGTH);
  const N = SCRYPT_COST;
  const r = SCRYPT_BLOCK_SIZE;
  const p = SCRYPT_PARALLELIZATION;

  const hash = await scryptAsync(password, salt, SCRYPT_KEY_LENGTH, { N, r, p });

  return `$scrypt$${N}$${r}$${p}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

function parsePasswordHash(
  stored: string
): { params: ScryptParams; salt: Buffer; hash: Buffer } | null {
  // Expected format: $scrypt$N$r$p$salt$hash
  const [empty, scheme, n, r, p, salt, hash, ...rest] = stored.split('$');

  if (
    empty !== '' ||
    scheme !== 'scrypt' ||
    n === undefined ||
    r === undefined ||
    p === undefined ||
    salt === undefined ||
    hash === undefined ||
    rest.length > 0
  ) {
    return null;
  }

  const params = { N: Number(n), r: Number(r), p: Number(p) };
  if (!Object.values(params).every((value) => Number.isSafeInteger(value) && value > 0)) {
    return null;
  }

  const hashBytes = Buffer.from(hash, 'base64');
  if (hashBytes.length === 0) {
    return null;
  }

  return { params, salt: Buffer.from(salt, 'base64'), hash: hashBytes };
}

/**
 * Verify a password against its stored hash
 *
 * A wrong password and a malformed hash both yield `false`.
 */
export async function verifyPassword(stored: string, password: string): Promise<boolean> {
  const parsed = parsePasswordHash(stored);
  if (!parsed) {
    return false;
  }

  let derived: Buffer;
  try {
    derived = await scryptAsync(password, parsed.salt, parsed.hash.length, parsed.params);
  } catch {
    // scrypt rejects parameters it cannot honour (N not a power of two, ...)
    return false;
  }

  return timingSafeEqual(parsed.hash, derived);
}

/**
 * Memoize an async hash computation
 *
 * A rejected computation is dropped from the cache so the next call retries.
 */
export function lazyHash(compute: () => Promise<string>): () => Promise<string> {
  let pending: Promise<string> | null = null;

  return () => {
    if (!pending) {
      pending = compute().catch((error: unknown) => {
        pending = null;
        throw error;
      });
    }
    return pending;
  };
}

/**
 * A valid hash of a random password, computed once
 *
 * Verified against when the user does not exist so an unknown email costs
 * the same as a wrong password.
 */
export const getDummyPasswordHash = lazyHash(() =>
  hashPassword(randomBytes(SCRYPT_SALT_LENGTH).toString('hex'))
);
