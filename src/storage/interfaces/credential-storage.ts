import type {
  AuthCode,
  AuthRequest,
  DeviceRequest,
  DeviceToken,
  RefreshToken,
} from '../../types/storage.js';

/**
 * Computes the new value of a row from the current one.
 *
 * Runs inside the storage transaction, so it must be synchronous and free
 * of side effects. Throwing aborts the update and the error reaches the
 * caller unchanged.
 */
export type Updater<T> = (old: T) => T;

/**
 * Storage interface for in-flight authorization requests
 */
export interface IAuthRequestStorage {
  /**
   * Throws AlreadyExistsError when the id is taken
   */
  create(request: AuthRequest): Promise<void>;

  /**
   * Throws NotFoundError when absent
   */
  get(id: string): Promise<AuthRequest>;

  /**
   * Read, apply the updater and write in one transaction
   */
  update(id: string, updater: Updater<AuthRequest>): Promise<AuthRequest>;

  delete(id: string): Promise<void>;
}

/**
 * Storage interface for authorization codes
 * Codes are immutable: read once at token exchange, then deleted
 */
export interface IAuthCodeStorage {
  create(code: AuthCode): Promise<void>;
  get(id: string): Promise<AuthCode>;
  delete(id: string): Promise<void>;
}

/**
 * Storage interface for refresh tokens
 */
export interface IRefreshTokenStorage {
  create(token: RefreshToken): Promise<void>;
  get(id: string): Promise<RefreshToken>;
  list(): Promise<RefreshToken[]>;

  /**
   * Concurrent updates of one token serialize; the second updater sees
   * the first one's result
   */
  update(id: string, updater: Updater<RefreshToken>): Promise<RefreshToken>;

  delete(id: string): Promise<void>;
}

/**
 * Storage interface for device authorization requests, keyed by user code
 */
export interface IDeviceRequestStorage {
  create(request: DeviceRequest): Promise<void>;
  get(userCode: string): Promise<DeviceRequest>;
  delete(userCode: string): Promise<void>;
}

/**
 * Storage interface for device flow tokens, keyed by device code
 */
export interface IDeviceTokenStorage {
  create(token: DeviceToken): Promise<void>;
  get(deviceCode: string): Promise<DeviceToken>;
  update(deviceCode: string, updater: Updater<DeviceToken>): Promise<DeviceToken>;
  delete(deviceCode: string): Promise<void>;
}
