import type {
  AuthCode,
  AuthRequest,
  DeviceRequest,
  DeviceToken,
  RefreshToken,
} from '../../types/storage.js';
import type {
  IAuthCodeStorage,
  IAuthRequestStorage,
  IDeviceRequestStorage,
  IDeviceTokenStorage,
  IRefreshTokenStorage,
  Updater,
} from '../interfaces/index.js';
import { MemoryTable } from './table.js';

/**
 * In-memory auth request storage implementation
 */
export class MemoryAuthRequestStorage implements IAuthRequestStorage {
  readonly table = new MemoryTable<AuthRequest>('auth request');

  async create(request: AuthRequest): Promise<void> {
    this.table.create(request.id, request);
  }

  async get(id: string): Promise<AuthRequest> {
    return this.table.get(id);
  }

  async update(id: string, updater: Updater<AuthRequest>): Promise<AuthRequest> {
    return this.table.update(id, (old) => ({ ...updater(old), id }));
  }

  async delete(id: string): Promise<void> {
    this.table.delete(id);
  }
}

/**
 * In-memory authorization code storage implementation
 */
export class MemoryAuthCodeStorage implements IAuthCodeStorage {
  readonly table = new MemoryTable<AuthCode>('auth code');

  async create(code: AuthCode): Promise<void> {
    this.table.create(code.id, code);
  }

  async get(id: string): Promise<AuthCode> {
    return this.table.get(id);
  }

  async delete(id: string): Promise<void> {
    this.table.delete(id);
  }
}

/**
 * In-memory refresh token storage implementation
 */
export class MemoryRefreshTokenStorage implements IRefreshTokenStorage {
  private readonly table = new MemoryTable<RefreshToken>('refresh token');

  async create(token: RefreshToken): Promise<void> {
    this.table.create(token.id, token);
  }

  async get(id: string): Promise<RefreshToken> {
    return this.table.get(id);
  }

  async list(): Promise<RefreshToken[]> {
    return this.table.list();
  }

  async update(id: string, updater: Updater<RefreshToken>): Promise<RefreshToken> {
    return this.table.update(id, (old) => ({ ...updater(old), id }));
  }

  async delete(id: string): Promise<void> {
    this.table.delete(id);
  }
}

/**
 * In-memory device request storage implementation
 */
export class MemoryDeviceRequestStorage implements IDeviceRequestStorage {
  readonly table = new MemoryTable<DeviceRequest>('device request');

  async create(request: DeviceRequest): Promise<void> {
    this.table.create(request.userCode, request);
  }

  async get(userCode: string): Promise<DeviceRequest> {
    return this.table.get(userCode);
  }

  async delete(userCode: string): Promise<void> {
    this.table.delete(userCode);
  }
}

/**
 * In-memory device token storage implementation
 */
export class MemoryDeviceTokenStorage implements IDeviceTokenStorage {
  readonly table = new MemoryTable<DeviceToken>('device token');

  async create(token: DeviceToken): Promise<void> {
    this.table.create(token.deviceCode, token);
  }

  async get(deviceCode: string): Promise<DeviceToken> {
    return this.table.get(deviceCode);
  }

  async update(deviceCode: string, updater: Updater<DeviceToken>): Promise<DeviceToken> {
    return this.table.update(deviceCode, (old) => ({ ...updater(old), deviceCode }));
  }

  async delete(deviceCode: string): Promise<void> {
    this.table.delete(deviceCode);
  }
}
