import type { Keys, OfflineSessions } from '../../types/storage.js';
import { emptyKeys } from '../../types/storage.js';
import type { HashFunction } from '../../crypto/hash.js';
import type { IKeyStorage, IOfflineSessionStorage, Updater } from '../interfaces/index.js';
import { offlineSessionKey } from '../offline-session-key.js';
import { MemoryTable } from './table.js';

const KEYS_ID = 'keys';

/**
 * In-memory offline session storage implementation
 */
export class MemoryOfflineSessionStorage implements IOfflineSessionStorage {
  private readonly table = new MemoryTable<OfflineSessions>('offline session');

  constructor(private readonly hash: HashFunction) {}

  async create(session: OfflineSessions): Promise<void> {
    this.table.create(this.key(session.userId, session.connId), session);
  }

  async get(userId: string, connId: string): Promise<OfflineSessions> {
    return this.table.get(this.key(userId, connId));
  }

  async update(
    userId: string,
    connId: string,
    updater: Updater<OfflineSessions>
  ): Promise<OfflineSessions> {
    return this.table.update(this.key(userId, connId), (old) => ({
      ...updater(old),
      userId,
      connId,
    }));
  }

  async delete(userId: string, connId: string): Promise<void> {
    this.table.delete(this.key(userId, connId));
  }

  private key(userId: string, connId: string): string {
    return offlineSessionKey(userId, connId, this.hash);
  }
}

/**
 * In-memory signing key storage implementation
 */
export class MemoryKeyStorage implements IKeyStorage {
  private readonly table = new MemoryTable<Keys>('keys');

  async get(): Promise<Keys> {
    return this.table.get(KEYS_ID);
  }

  async update(updater: Updater<Keys>): Promise<Keys> {
    return this.table.upsert(KEYS_ID, emptyKeys(), updater);
  }
}
