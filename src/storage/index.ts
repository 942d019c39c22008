import type { IStorage, StorageOptions } from './interfaces/index.js';
import { createMemoryStorage } from './memory/index.js';
import { createSqliteStorage } from './sqlite/index.js';

export * from './interfaces/index.js';
export { createMemoryStorage } from './memory/index.js';
export { createSqliteStorage, type SqliteStorageOptions } from './sqlite/index.js';
export { offlineSessionKey } from './offline-session-key.js';

export type StorageConfig =
  | { type: 'memory' }
  | { type: 'sqlite'; path: string };

/**
 * Open the configured storage backend
 */
export function createStorage(config: StorageConfig, options: StorageOptions = {}): IStorage {
  switch (config.type) {
    case 'memory':
      return createMemoryStorage(options);
    case 'sqlite':
      return createSqliteStorage({ ...options, path: config.path });
  }
}
