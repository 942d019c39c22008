export * from './credential-storage.js';
export * from './client-storage.js';
export * from './session-storage.js';

import type { GCResult } from '../../types/storage.js';
import type { HashFunction } from '../../crypto/hash.js';
import type {
  IAuthCodeStorage,
  IAuthRequestStorage,
  IDeviceRequestStorage,
  IDeviceTokenStorage,
  IRefreshTokenStorage,
} from './credential-storage.js';
import type { IClientStorage, IConnectorStorage, IPasswordStorage } from './client-storage.js';
import type { IKeyStorage, IOfflineSessionStorage } from './session-storage.js';

/**
 * Complete storage interface for the broker
 *
 * Every backend behaves identically: missing rows raise NotFoundError,
 * key collisions raise AlreadyExistsError, and anything else the backend
 * reports is wrapped in StorageError.
 */
export interface IStorage {
  authRequests: IAuthRequestStorage;
  authCodes: IAuthCodeStorage;
  refreshTokens: IRefreshTokenStorage;
  deviceRequests: IDeviceRequestStorage;
  deviceTokens: IDeviceTokenStorage;
  clients: IClientStorage;
  connectors: IConnectorStorage;
  passwords: IPasswordStorage;
  offlineSessions: IOfflineSessionStorage;
  keys: IKeyStorage;

  /**
   * Delete auth requests, auth codes, device requests and device tokens
   * whose expiry is strictly before now, in that order. Stops at the first
   * failing entity type.
   */
  garbageCollect(now: Date): Promise<GCResult>;

  close(): Promise<void>;
}

/**
 * Storage factory options
 */
export interface StorageOptions {
  /**
   * Derives the offline session key from userId + connId. SHA-256 hex by default.
   */
  offlineSessionHash?: HashFunction;
}
