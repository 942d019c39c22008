import type { IStorage, StorageOptions } from '../interfaces/index.js';
import type { GCResult } from '../../types/storage.js';
import { sha256 } from '../../crypto/hash.js';
import {
  MemoryAuthCodeStorage,
  MemoryAuthRequestStorage,
  MemoryDeviceRequestStorage,
  MemoryDeviceTokenStorage,
  MemoryRefreshTokenStorage,
} from './credential-storage.js';
import { MemoryClientStorage, MemoryConnectorStorage, MemoryPasswordStorage } from './client-storage.js';
import { MemoryKeyStorage, MemoryOfflineSessionStorage } from './session-storage.js';

export {
  MemoryAuthCodeStorage,
  MemoryAuthRequestStorage,
  MemoryDeviceRequestStorage,
  MemoryDeviceTokenStorage,
  MemoryRefreshTokenStorage,
} from './credential-storage.js';
export { MemoryClientStorage, MemoryConnectorStorage, MemoryPasswordStorage } from './client-storage.js';
export { MemoryKeyStorage, MemoryOfflineSessionStorage } from './session-storage.js';
export { MemoryTable } from './table.js';

/**
 * Create a complete in-memory storage implementation
 */
export function createMemoryStorage(options: StorageOptions = {}): IStorage {
  const authRequests = new MemoryAuthRequestStorage();
  const authCodes = new MemoryAuthCodeStorage();
  const deviceRequests = new MemoryDeviceRequestStorage();
  const deviceTokens = new MemoryDeviceTokenStorage();

  // Synchronous: no request interleaves with a sweep
  const garbageCollect = async (now: Date): Promise<GCResult> => {
    const expired = (row: { expiry: Date }): boolean => row.expiry.getTime() < now.getTime();

    return {
      authRequests: authRequests.table.deleteWhere(expired),
      authCodes: authCodes.table.deleteWhere(expired),
      deviceRequests: deviceRequests.table.deleteWhere(expired),
      deviceTokens: deviceTokens.table.deleteWhere(expired),
    };
  };

  return {
    authRequests,
    authCodes,
    refreshTokens: new MemoryRefreshTokenStorage(),
    deviceRequests,
    deviceTokens,
    clients: new MemoryClientStorage(),
    connectors: new MemoryConnectorStorage(),
    passwords: new MemoryPasswordStorage(),
    offlineSessions: new MemoryOfflineSessionStorage(options.offlineSessionHash ?? sha256),
    keys: new MemoryKeyStorage(),
    garbageCollect,
    close: async () => undefined,
  };
}
