import { randomBytes, randomUUID } from 'node:crypto';
import { REFRESH_TOKEN_LENGTH } from '../config/constants.js';

/**
 * Generate cryptographically secure random bytes as hex string
 */
export function generateRandomHex(length: number): string {
  return randomBytes(length).toString('hex');
}

/**
 * Generate a secure refresh token
 * 32 bytes by default: 256 bits of entropy as 64 fixed-width hex characters
 */
export function generateRefreshToken(length: number = REFRESH_TOKEN_LENGTH): string {
  return generateRandomHex(length);
}

/**
 * Generate a unique ID for database records
 */
export function generateId(): string {
  return randomUUID();
}
