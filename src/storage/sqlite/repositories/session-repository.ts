import { eq } from 'drizzle-orm';
import type { Keys, OfflineSessions, RefreshTokenRef } from '../../../types/storage.js';
import { emptyKeys } from '../../../types/storage.js';
import type { HashFunction } from '../../../crypto/hash.js';
import type { IKeyStorage, IOfflineSessionStorage, Updater } from '../../interfaces/index.js';
import { NotFoundError } from '../../../errors/storage-error.js';
import { offlineSessionKey } from '../../offline-session-key.js';
import type { SqliteClient } from '../client.js';
import {
  keys,
  offlineSessions,
  type KeysRow,
  type OfflineSessionRow,
  type StoredRefreshTokenRef,
} from '../schema.js';
import { deleteRow, fromBuffer, insertRow, query, toBuffer } from './helpers.js';

// The keys table holds exactly one row
const KEYS_ID = 'keys';

const OFFLINE_SESSION = 'offline session';
const KEYS = 'keys';

function rowToOfflineSessions(row: OfflineSessionRow): OfflineSessions {
  const refresh: Record<string, RefreshTokenRef> = {};
  for (const [clientId, ref] of Object.entries(row.refresh)) {
    refresh[clientId] = {
      id: ref.id,
      clientId: ref.clientId,
      createdAt: new Date(ref.createdAt),
      lastUsed: new Date(ref.lastUsed),
    };
  }

  return {
    userId: row.userId,
    connId: row.connId,
    refresh,
    connectorData: fromBuffer(row.connectorData),
  };
}

function offlineSessionsToRow(id: string, session: OfflineSessions): OfflineSessionRow {
  const refresh: Record<string, StoredRefreshTokenRef> = {};
  for (const [clientId, ref] of Object.entries(session.refresh)) {
    refresh[clientId] = {
      id: ref.id,
      clientId: ref.clientId,
      createdAt: ref.createdAt.getTime(),
      lastUsed: ref.lastUsed.getTime(),
    };
  }

  return {
    id,
    userId: session.userId,
    connId: session.connId,
    refresh,
    connectorData: toBuffer(session.connectorData),
  };
}

function rowToKeys(row: KeysRow): Keys {
  return {
    signingKey: row.signingKey ?? undefined,
    signingKeyPub: row.signingKeyPub ?? undefined,
    verificationKeys: row.verificationKeys.map((key) => ({
      publicKey: key.publicKey,
      expiry: new Date(key.expiry),
    })),
    nextRotation: row.nextRotation,
  };
}

function keysToRow(value: Keys): KeysRow {
  return {
    id: KEYS_ID,
    signingKey: value.signingKey ?? null,
    signingKeyPub: value.signingKeyPub ?? null,
    verificationKeys: value.verificationKeys.map((key) => ({
      publicKey: key.publicKey,
      expiry: key.expiry.getTime(),
    })),
    nextRotation: value.nextRotation,
  };
}

/**
 * SQLite offline session storage implementation
 *
 * Rows are keyed by hash(userId + connId) since the table has a single
 * column primary key.
 */
export class SqliteOfflineSessionStorage implements IOfflineSessionStorage {
  constructor(
    private readonly client: SqliteClient,
    private readonly hash: HashFunction
  ) {}

  async create(session: OfflineSessions): Promise<void> {
    const id = this.key(session.userId, session.connId);
    insertRow(OFFLINE_SESSION, id, () =>
      this.client.db.insert(offlineSessions).values(offlineSessionsToRow(id, session)).run()
    );
  }

  async get(userId: string, connId: string): Promise<OfflineSessions> {
    const id = this.key(userId, connId);
    const row = query(OFFLINE_SESSION, () =>
      this.client.db.select().from(offlineSessions).where(eq(offlineSessions.id, id)).get()
    );
    if (!row) {
      throw new NotFoundError(OFFLINE_SESSION, id);
    }
    return rowToOfflineSessions(row);
  }

  async update(
    userId: string,
    connId: string,
    updater: Updater<OfflineSessions>
  ): Promise<OfflineSessions> {
    const id = this.key(userId, connId);
    return this.client.transaction(`update ${OFFLINE_SESSION}`, (db) => {
      const row = db.select().from(offlineSessions).where(eq(offlineSessions.id, id)).get();
      if (!row) {
        throw new NotFoundError(OFFLINE_SESSION, id);
      }

      const next = { ...updater(rowToOfflineSessions(row)), userId, connId };
      db.update(offlineSessions)
        .set(offlineSessionsToRow(id, next))
        .where(eq(offlineSessions.id, id))
        .run();
      return next;
    });
  }

  async delete(userId: string, connId: string): Promise<void> {
    const id = this.key(userId, connId);
    deleteRow(OFFLINE_SESSION, id, () =>
      this.client.db.delete(offlineSessions).where(eq(offlineSessions.id, id)).run()
    );
  }

  private key(userId: string, connId: string): string {
    return offlineSessionKey(userId, connId, this.hash);
  }
}

/**
 * SQLite signing key storage implementation
 */
export class SqliteKeyStorage implements IKeyStorage {
  constructor(private readonly client: SqliteClient) {}

  async get(): Promise<Keys> {
    const row = query(KEYS, () =>
      this.client.db.select().from(keys).where(eq(keys.id, KEYS_ID)).get()
    );
    if (!row) {
      throw new NotFoundError(KEYS, KEYS_ID);
    }
    return rowToKeys(row);
  }

  /**
   * BEGIN IMMEDIATE holds the write lock from the read onwards, so two
   * rotations cannot both read the same keys
   */
  async update(updater: Updater<Keys>): Promise<Keys> {
    return this.client.transaction(`update ${KEYS}`, (db) => {
      const row = db.select().from(keys).where(eq(keys.id, KEYS_ID)).get();
      const next = updater(row ? rowToKeys(row) : emptyKeys());

      if (row) {
        db.update(keys).set(keysToRow(next)).where(eq(keys.id, KEYS_ID)).run();
      } else {
        db.insert(keys).values(keysToRow(next)).run();
      }

      return next;
    });
  }
}
