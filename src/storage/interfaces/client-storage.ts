import type { Client, Connector, Password } from '../../types/storage.js';
import type { Updater } from './credential-storage.js';

/**
 * Storage interface for OAuth client management
 */
export interface IClientStorage {
  create(client: Client): Promise<void>;
  get(id: string): Promise<Client>;
  list(): Promise<Client[]>;
  update(id: string, updater: Updater<Client>): Promise<Client>;
  delete(id: string): Promise<void>;
}

/**
 * Storage interface for connector definitions
 */
export interface IConnectorStorage {
  create(connector: Connector): Promise<void>;
  get(id: string): Promise<Connector>;
  list(): Promise<Connector[]>;
  update(id: string, updater: Updater<Connector>): Promise<Connector>;
  delete(id: string): Promise<void>;
}

/**
 * Storage interface for local passwords
 * Emails are matched case-insensitively; they are stored lower-cased
 */
export interface IPasswordStorage {
  create(password: Password): Promise<void>;
  get(email: string): Promise<Password>;
  list(): Promise<Password[]>;
  update(email: string, updater: Updater<Password>): Promise<Password>;
  delete(email: string): Promise<void>;
}
