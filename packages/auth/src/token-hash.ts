import { createHash, randomBytes } from 'node:crypto';

/**
 * Draw `size` random bytes and encode them URL-safe. The result is shown
 * to the client once and never stored.
 */
export function generateTokenValue(size: number): string {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Token size must be a positive integer, got ${size}`);
  }
  return randomBytes(size).toString('base64url');
}

/**
 * SHA-256 of the token value, hex encoded. This is the only form persisted.
 */
export function hashTokenValue(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}
