import { describe, it, expect, vi } from 'vitest';
import {
  hashPassword,
  verifyPassword,
  constantTimeCompare,
  getDummyPasswordHash,
  lazyHash,
} from '../../crypto/hash.js';
import { generateRefreshToken } from '../../crypto/random.js';

describe('Password hashing', () => {
  it('should produce a salted scrypt hash', async () => {
    const first = await hashPassword('04234');
    const second = await hashPassword('04234');

    expect(first).toMatch(/^\$scrypt\$16384\$8\$1\$[A-Za-z0-9+/=]+\$[A-Za-z0-9+/=]+$/);
    expect(first).not.toBe(second);
  });

  it('should verify the right password only', async () => {
    const hash = await hashPassword('04234');

    expect(await verifyPassword(hash, '04234')).toBe(true);
    expect(await verifyPassword(hash, '04235')).toBe(false);
    expect(await verifyPassword(hash, '')).toBe(false);
  });

  it('should treat a malformed hash as a mismatch', async () => {
    expect(await verifyPassword('', 'password')).toBe(false);
    expect(await verifyPassword('plaintext', 'plaintext')).toBe(false);
    expect(await verifyPassword('$bcrypt$10$abc$def', 'password')).toBe(false);
    expect(await verifyPassword('$scrypt$abc$8$1$c2FsdA==$aGFzaA==', 'password')).toBe(false);
    expect(await verifyPassword('$scrypt$3$8$1$c2FsdA==$aGFzaA==', 'password')).toBe(false);
  });

  it('should cache the dummy hash', async () => {
    const hash = await getDummyPasswordHash();

    expect(await getDummyPasswordHash()).toBe(hash);
    expect(hash.startsWith('$scrypt$')).toBe(true);
  });
});

describe('lazyHash', () => {
  it('should compute once and share the result', async () => {
    const compute = vi.fn<() => Promise<string>>().mockResolvedValue('$scrypt$cached');
    const get = lazyHash(compute);

    expect(await Promise.all([get(), get()])).toEqual(['$scrypt$cached', '$scrypt$cached']);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('should retry after a failed computation', async () => {
    const compute = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('out of memory'))
      .mockResolvedValue('$scrypt$second');
    const get = lazyHash(compute);

    await expect(get()).rejects.toThrow('out of memory');
    expect(await get()).toBe('$scrypt$second');
    expect(await get()).toBe('$scrypt$second');
    expect(compute).toHaveBeenCalledTimes(2);
  });
});

describe('constantTimeCompare', () => {
  it('should compare strings of any length', () => {
    expect(constantTimeCompare('test-polka-key', 'test-polka-key')).toBe(true);
    expect(constantTimeCompare('test-polka-key', 'test-polka-kez')).toBe(false);
    expect(constantTimeCompare('short', 'a much longer value')).toBe(false);
  });
});

describe('generateRefreshToken', () => {
  it('should produce 64 hex characters', () => {
    const token = generateRefreshToken();

    expect(token).toMatch(/^[0-9a-f]{64}$/);
    expect(generateRefreshToken()).not.toBe(token);
  });
});
