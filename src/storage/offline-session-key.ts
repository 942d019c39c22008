import { sha256, type HashFunction } from '../crypto/hash.js';

/**
 * Single-column key for an offline session: hash(userId + connId)
 */
export function offlineSessionKey(
  userId: string,
  connId: string,
  hash: HashFunction = sha256
): string {
  return hash(userId + connId);
}
