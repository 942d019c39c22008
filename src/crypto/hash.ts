import { createHash, timingSafeEqual } from 'node:crypto';

/**
 * Deterministic string hash, hex encoded
 */
export type HashFunction = (value: string) => string;

/**
 * Hash a value using SHA-256
 * Used for the synthetic offline session key and token comparison
 */
export const sha256: HashFunction = (value) => {
  return createHash('sha256').update(value, 'utf8').digest('hex');
};

/**
 * Compare two strings in constant time to prevent timing attacks
 */
export function constantTimeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }

  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');

  return timingSafeEqual(bufA, bufB);
}
