import type { Keys, OfflineSessions } from '../../types/storage.js';
import type { Updater } from './credential-storage.js';

/**
 * Storage interface for offline sessions, keyed by (userId, connId)
 */
export interface IOfflineSessionStorage {
  create(session: OfflineSessions): Promise<void>;
  get(userId: string, connId: string): Promise<OfflineSessions>;
  update(userId: string, connId: string, updater: Updater<OfflineSessions>): Promise<OfflineSessions>;
  delete(userId: string, connId: string): Promise<void>;
}

/**
 * Storage interface for the singleton signing key record
 */
export interface IKeyStorage {
  /**
   * Throws NotFoundError before the first rotation
   */
  get(): Promise<Keys>;

  /**
   * Apply the updater to the current keys, or to empty keys on the first
   * call, under the strictest isolation the backend offers. Creates the
   * row on the first call and updates it afterwards.
   */
  update(updater: Updater<Keys>): Promise<Keys>;
}
