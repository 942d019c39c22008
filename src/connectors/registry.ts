import type { ZodError } from 'zod';
import type { Connector as StoredConnector } from '../types/storage.js';
import { ConfigurationError } from '../errors/connector-error.js';
import { CONNECTOR_TYPE_GITLAB, CONNECTOR_TYPE_GOOGLE } from '../config/constants.js';
import type { Connector } from './types.js';
import { decodeConnectorData } from './types.js';
import { GitLabConnector, gitlabConfigSchema } from './gitlab.js';
import { GoogleConnector, type GoogleConnectorOptions, googleConfigSchema } from './google.js';

/**
 * Options accepted by every connector constructor. Options that only one
 * type understands are ignored by the others.
 */
export type OpenConnectorOptions = GoogleConnectorOptions;

type ConnectorConstructor = (id: string, config: unknown, options: OpenConnectorOptions) => Connector;

const registry: ReadonlyMap<string, ConnectorConstructor> = new Map<string, ConnectorConstructor>([
  [
    CONNECTOR_TYPE_GITLAB,
    (id, config, options) => {
      const result = gitlabConfigSchema.safeParse(config);
      if (!result.success) {
        throw invalidConfig(CONNECTOR_TYPE_GITLAB, id, result.error);
      }
      return new GitLabConnector(id, result.data, options);
    },
  ],
  [
    CONNECTOR_TYPE_GOOGLE,
    (id, config, options) => {
      const result = googleConfigSchema.safeParse(config);
      if (!result.success) {
        throw invalidConfig(CONNECTOR_TYPE_GOOGLE, id, result.error);
      }
      return new GoogleConnector(id, result.data, options);
    },
  ],
]);

/**
 * Connector types that can be opened
 */
export function connectorTypes(): string[] {
  return [...registry.keys()];
}

/**
 * Validate a raw configuration object and construct the connector
 */
export function openConnector(
  type: string,
  id: string,
  config: unknown,
  options: OpenConnectorOptions = {}
): Connector {
  const open = registry.get(type);
  if (!open) {
    throw new ConfigurationError(`unknown connector type "${type}" for connector "${id}"`);
  }
  return open(id, config, options);
}

/**
 * Open a connector from its stored definition, whose config is JSON bytes
 */
export function openStoredConnector(
  stored: StoredConnector,
  options: OpenConnectorOptions = {}
): Connector {
  let config: unknown;
  try {
    config = decodeConnectorData(stored.config);
  } catch (err) {
    throw new ConfigurationError(`connector "${stored.id}": config is not valid JSON`, err);
  }
  return openConnector(stored.type, stored.id, config, options);
}

function invalidConfig(type: string, id: string, error: ZodError): ConfigurationError {
  const details = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  return new ConfigurationError(`${type} connector "${id}": invalid config: ${details}`, error);
}
