import type { Client, Connector, Password } from '../../types/storage.js';
import type {
  IClientStorage,
  IConnectorStorage,
  IPasswordStorage,
  Updater,
} from '../interfaces/index.js';
import { MemoryTable } from './table.js';

/**
 * In-memory client storage implementation
 */
export class MemoryClientStorage implements IClientStorage {
  private readonly table = new MemoryTable<Client>('client');

  async create(client: Client): Promise<void> {
    this.table.create(client.id, client);
  }

  async get(id: string): Promise<Client> {
    return this.table.get(id);
  }

  async list(): Promise<Client[]> {
    return this.table.list();
  }

  async update(id: string, updater: Updater<Client>): Promise<Client> {
    return this.table.update(id, (old) => ({ ...updater(old), id }));
  }

  async delete(id: string): Promise<void> {
    this.table.delete(id);
  }
}

/**
 * In-memory connector storage implementation
 */
export class MemoryConnectorStorage implements IConnectorStorage {
  private readonly table = new MemoryTable<Connector>('connector');

  async create(connector: Connector): Promise<void> {
    this.table.create(connector.id, connector);
  }

  async get(id: string): Promise<Connector> {
    return this.table.get(id);
  }

  async list(): Promise<Connector[]> {
    return this.table.list();
  }

  async update(id: string, updater: Updater<Connector>): Promise<Connector> {
    return this.table.update(id, (old) => ({ ...updater(old), id }));
  }

  async delete(id: string): Promise<void> {
    this.table.delete(id);
  }
}

/**
 * In-memory password storage implementation
 */
export class MemoryPasswordStorage implements IPasswordStorage {
  private readonly table = new MemoryTable<Password>('password');

  async create(password: Password): Promise<void> {
    const email = password.email.toLowerCase();
    this.table.create(email, { ...password, email });
  }

  async get(email: string): Promise<Password> {
    return this.table.get(email.toLowerCase());
  }

  async list(): Promise<Password[]> {
    return this.table.list();
  }

  async update(email: string, updater: Updater<Password>): Promise<Password> {
    return this.table.update(email.toLowerCase(), (old) => {
      const next = updater(old);
      return { ...next, email: old.email };
    });
  }

  async delete(email: string): Promise<void> {
    this.table.delete(email.toLowerCase());
  }
}
