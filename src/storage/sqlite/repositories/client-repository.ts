import { eq } from 'drizzle-orm';
import type { Client, Connector, Password } from '../../../types/storage.js';
import type {
  IClientStorage,
  IConnectorStorage,
  IPasswordStorage,
  Updater,
} from '../../interfaces/index.js';
import { NotFoundError } from '../../../errors/storage-error.js';
import type { SqliteClient } from '../client.js';
import { clients, connectors, passwords, type ConnectorRow } from '../schema.js';
import { deleteRow, fromBuffer, insertRow, query, toBuffer } from './helpers.js';

function rowToConnector(row: ConnectorRow): Connector {
  return { ...row, config: fromBuffer(row.config) };
}

function connectorToRow(connector: Connector): ConnectorRow {
  return { ...connector, config: toBuffer(connector.config) };
}

const CLIENT = 'client';
const CONNECTOR = 'connector';
const PASSWORD = 'password';

/**
 * SQLite client storage implementation
 */
export class SqliteClientStorage implements IClientStorage {
  constructor(private readonly client: SqliteClient) {}

  async create(client: Client): Promise<void> {
    insertRow(CLIENT, client.id, () => this.client.db.insert(clients).values(client).run());
  }

  async get(id: string): Promise<Client> {
    const row = query(CLIENT, () =>
      this.client.db.select().from(clients).where(eq(clients.id, id)).get()
    );
    if (!row) {
      throw new NotFoundError(CLIENT, id);
    }
    return row;
  }

  async list(): Promise<Client[]> {
    return query(CLIENT, () => this.client.db.select().from(clients).all());
  }

  async update(id: string, updater: Updater<Client>): Promise<Client> {
    return this.client.transaction(`update ${CLIENT}`, (db) => {
      const row = db.select().from(clients).where(eq(clients.id, id)).get();
      if (!row) {
        throw new NotFoundError(CLIENT, id);
      }

      const next = { ...updater(row), id };
      db.update(clients).set(next).where(eq(clients.id, id)).run();
      return next;
    });
  }

  async delete(id: string): Promise<void> {
    deleteRow(CLIENT, id, () => this.client.db.delete(clients).where(eq(clients.id, id)).run());
  }
}

/**
 * SQLite connector storage implementation
 */
export class SqliteConnectorStorage implements IConnectorStorage {
  constructor(private readonly client: SqliteClient) {}

  async create(connector: Connector): Promise<void> {
    insertRow(CONNECTOR, connector.id, () =>
      this.client.db.insert(connectors).values(connectorToRow(connector)).run()
    );
  }

  async get(id: string): Promise<Connector> {
    const row = query(CONNECTOR, () =>
      this.client.db.select().from(connectors).where(eq(connectors.id, id)).get()
    );
    if (!row) {
      throw new NotFoundError(CONNECTOR, id);
    }
    return rowToConnector(row);
  }

  async list(): Promise<Connector[]> {
    const rows = query(CONNECTOR, () => this.client.db.select().from(connectors).all());
    return rows.map(rowToConnector);
  }

  async update(id: string, updater: Updater<Connector>): Promise<Connector> {
    return this.client.transaction(`update ${CONNECTOR}`, (db) => {
      const row = db.select().from(connectors).where(eq(connectors.id, id)).get();
      if (!row) {
        throw new NotFoundError(CONNECTOR, id);
      }

      const next = { ...updater(rowToConnector(row)), id };
      db.update(connectors).set(connectorToRow(next)).where(eq(connectors.id, id)).run();
      return next;
    });
  }

  async delete(id: string): Promise<void> {
    deleteRow(CONNECTOR, id, () =>
      this.client.db.delete(connectors).where(eq(connectors.id, id)).run()
    );
  }
}

/**
 * SQLite password storage implementation
 * Emails are lower-cased on the way in
 */
export class SqlitePasswordStorage implements IPasswordStorage {
  constructor(private readonly client: SqliteClient) {}

  async create(password: Password): Promise<void> {
    const email = password.email.toLowerCase();
    insertRow(PASSWORD, email, () =>
      this.client.db.insert(passwords).values({ ...password, email }).run()
    );
  }

  async get(email: string): Promise<Password> {
    const key = email.toLowerCase();
    const row = query(PASSWORD, () =>
      this.client.db.select().from(passwords).where(eq(passwords.email, key)).get()
    );
    if (!row) {
      throw new NotFoundError(PASSWORD, key);
    }
    return row;
  }

  async list(): Promise<Password[]> {
    return query(PASSWORD, () => this.client.db.select().from(passwords).all());
  }

  async update(email: string, updater: Updater<Password>): Promise<Password> {
    const key = email.toLowerCase();
    return this.client.transaction(`update ${PASSWORD}`, (db) => {
      const row = db.select().from(passwords).where(eq(passwords.email, key)).get();
      if (!row) {
        throw new NotFoundError(PASSWORD, key);
      }

      const next = { ...updater(row), email: key };
      db.update(passwords).set(next).where(eq(passwords.email, key)).run();
      return next;
    });
  }

  async delete(email: string): Promise<void> {
    const key = email.toLowerCase();
    deleteRow(PASSWORD, key, () =>
      this.client.db.delete(passwords).where(eq(passwords.email, key)).run()
    );
  }
}
