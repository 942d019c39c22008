import type { IStorage } from '../storage/interfaces/index.js';
import type { Client, Connector as StoredConnector } from '../types/storage.js';
import type { ConnectorDefinition } from '../config/static-config.js';
import type { Connector } from '../connectors/types.js';
import { encodeConnectorData } from '../connectors/types.js';
import { openStoredConnector, type OpenConnectorOptions } from '../connectors/registry.js';
import { isNotFound } from '../errors/storage-error.js';
import { sha256 } from '../crypto/hash.js';
import { noopLogger, type Logger } from '../utils/logger.js';

function toStoredConnector(definition: ConnectorDefinition): StoredConnector {
  return {
    id: definition.id,
    type: definition.type,
    name: definition.name,
    resourceVersion: sha256(JSON.stringify(definition.config)).slice(0, 16),
    config: encodeConnectorData(definition.config),
  };
}

/**
 * Write statically configured connectors into storage, replacing
 * existing definitions with the same id
 */
export async function syncConnectors(
  storage: IStorage,
  definitions: ConnectorDefinition[]
): Promise<void> {
  for (const definition of definitions) {
    const stored = toStoredConnector(definition);
    try {
      await storage.connectors.update(stored.id, () => stored);
    } catch (err) {
      if (!isNotFound(err)) {
        throw err;
      }
      await storage.connectors.create(stored);
    }
  }
}

/**
 * Write statically configured clients into storage
 */
export async function syncClients(storage: IStorage, clients: Client[]): Promise<void> {
  for (const client of clients) {
    try {
      await storage.clients.update(client.id, () => client);
    } catch (err) {
      if (!isNotFound(err)) {
        throw err;
      }
      await storage.clients.create(client);
    }
  }
}

/**
 * Open every stored connector. A connector with a broken configuration
 * is logged and left out rather than failing the others.
 */
export async function openConnectors(
  storage: IStorage,
  options: OpenConnectorOptions = {}
): Promise<Map<string, Connector>> {
  const logger: Logger = options.logger ?? noopLogger;
  const connectors = new Map<string, Connector>();

  for (const stored of await storage.connectors.list()) {
    try {
      const connector = openStoredConnector(stored, options);
      connectors.set(stored.id, connector);
      logger.info('connector opened', { connector: stored.id, type: stored.type });
    } catch (err) {
      logger.error('failed to open connector', { connector: stored.id, error: err });
    }
  }

  return connectors;
}
