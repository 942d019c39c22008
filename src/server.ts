import { serve } from '@hono/node-server';
import { createIdentityBroker } from './app.js';
import { getConfig } from './config/index.js';
import { loadClientDefinitions, loadConnectorDefinitions } from './config/static-config.js';
import { createStorage } from './storage/index.js';
import { syncClients, syncConnectors, openConnectors } from './services/connector-service.js';
import { startGarbageCollection } from './services/gc-service.js';
import {
  KeyRotator,
  defaultRotationStrategy,
  staticRotationStrategy,
  startKeyRotation,
} from './services/key-rotation-service.js';
import { createConsoleLogger } from './utils/logger.js';

// Load configuration
const config = getConfig();
const logger = createConsoleLogger(config.logging.level);

const storage = createStorage(config.storage);
logger.info('storage opened', { type: config.storage.type });

if (config.clientsFile) {
  await syncClients(storage, loadClientDefinitions(config.clientsFile));
}
if (config.connectorsFile) {
  await syncConnectors(storage, loadConnectorDefinitions(config.connectorsFile));
}

const connectors = await openConnectors(storage, { logger });
if (connectors.size === 0) {
  logger.warn('no connectors configured, set CONNECTORS_FILE');
}

const strategy = config.keys.staticKey
  ? staticRotationStrategy(config.keys.staticKey)
  : defaultRotationStrategy(config.keys.rotationFrequencyMs, config.keys.idTokenValidForMs);

const stopKeyRotation = await startKeyRotation(
  new KeyRotator(storage.keys, strategy, { logger: logger.child({ component: 'key-rotation' }) }),
  { checkIntervalMs: config.keys.checkIntervalMs, logger }
);

const stopGarbageCollection = startGarbageCollection(storage, {
  intervalMs: config.gc.intervalMs,
  logger: logger.child({ component: 'gc' }),
});

const app = createIdentityBroker({
  storage,
  connectors,
  issuer: config.server.issuer,
  logger,
  authRequestTtlMs: config.authRequestTtlMs,
  authCodeTtlMs: config.authCodeTtlMs,
});

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('identity broker listening', {
      address: info.address,
      port: info.port,
      issuer: config.server.issuer,
      connectors: [...connectors.keys()],
    });
  }
);

function shutdown(signal: string): void {
  logger.info('shutting down', { signal });
  stopGarbageCollection();
  stopKeyRotation();
  server.close(() => {
    storage.close().catch((err: unknown) => {
      logger.error('failed to close storage', { error: err });
    });
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
