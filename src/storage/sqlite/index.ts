import { lt } from 'drizzle-orm';
import type { IStorage, StorageOptions } from '../interfaces/index.js';
import type { GCResult } from '../../types/storage.js';
import { sha256 } from '../../crypto/hash.js';
import { SqliteClient, convertDBError } from './client.js';
import { authCodes, authRequests, deviceRequests, deviceTokens } from './schema.js';
import {
  SqliteAuthCodeStorage,
  SqliteAuthRequestStorage,
  SqliteDeviceRequestStorage,
  SqliteDeviceTokenStorage,
  SqliteRefreshTokenStorage,
} from './repositories/credential-repository.js';
import {
  SqliteClientStorage,
  SqliteConnectorStorage,
  SqlitePasswordStorage,
} from './repositories/client-repository.js';
import { SqliteKeyStorage, SqliteOfflineSessionStorage } from './repositories/session-repository.js';

export { SqliteClient, convertDBError } from './client.js';
export {
  SqliteAuthCodeStorage,
  SqliteAuthRequestStorage,
  SqliteDeviceRequestStorage,
  SqliteDeviceTokenStorage,
  SqliteRefreshTokenStorage,
} from './repositories/credential-repository.js';
export {
  SqliteClientStorage,
  SqliteConnectorStorage,
  SqlitePasswordStorage,
} from './repositories/client-repository.js';
export { SqliteKeyStorage, SqliteOfflineSessionStorage } from './repositories/session-repository.js';

export interface SqliteStorageOptions extends StorageOptions {
  /** Database file, or ":memory:" */
  path: string;
}

/**
 * Delete expired rows with one conditional DELETE per table. The first
 * failure aborts the sweep.
 */
function garbageCollect(client: SqliteClient, now: Date): GCResult {
  const sweep = (entity: string, run: () => { changes: number }): number => {
    try {
      return run().changes;
    } catch (err) {
      throw convertDBError(`gc ${entity}`, err);
    }
  };

  const { db } = client;
  const authRequestsDeleted = sweep('auth requests', () =>
    db.delete(authRequests).where(lt(authRequests.expiry, now)).run()
  );
  const authCodesDeleted = sweep('auth codes', () =>
    db.delete(authCodes).where(lt(authCodes.expiry, now)).run()
  );
  const deviceRequestsDeleted = sweep('device requests', () =>
    db.delete(deviceRequests).where(lt(deviceRequests.expiry, now)).run()
  );
  const deviceTokensDeleted = sweep('device tokens', () =>
    db.delete(deviceTokens).where(lt(deviceTokens.expiry, now)).run()
  );

  return {
    authRequests: authRequestsDeleted,
    authCodes: authCodesDeleted,
    deviceRequests: deviceRequestsDeleted,
    deviceTokens: deviceTokensDeleted,
  };
}

/**
 * Create a complete SQLite storage implementation backed by drizzle
 */
export function createSqliteStorage(options: SqliteStorageOptions): IStorage {
  return openSqliteStorage(new SqliteClient(options.path), options);
}

/**
 * Storage over an already open client. close() closes the client.
 */
export function openSqliteStorage(client: SqliteClient, options: StorageOptions = {}): IStorage {
  return {
    authRequests: new SqliteAuthRequestStorage(client),
    authCodes: new SqliteAuthCodeStorage(client),
    refreshTokens: new SqliteRefreshTokenStorage(client),
    deviceRequests: new SqliteDeviceRequestStorage(client),
    deviceTokens: new SqliteDeviceTokenStorage(client),
    clients: new SqliteClientStorage(client),
    connectors: new SqliteConnectorStorage(client),
    passwords: new SqlitePasswordStorage(client),
    offlineSessions: new SqliteOfflineSessionStorage(client, options.offlineSessionHash ?? sha256),
    keys: new SqliteKeyStorage(client),
    garbageCollect: async (now) => garbageCollect(client, now),
    close: async () => client.close(),
  };
}
