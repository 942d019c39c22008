import { Hono } from 'hono';
import type { BrokerEnv } from './types/hono.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { Connector } from './connectors/types.js';
import { oauthErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { createLoginRoutes, createCallbackRoutes } from './routes/connectors/index.js';
import { createJWKSRoutes } from './routes/discovery/index.js';
import { noopLogger, type Logger } from './utils/logger.js';
import { DEFAULT_AUTH_CODE_TTL_MS, DEFAULT_AUTH_REQUEST_TTL_MS } from './config/constants.js';

export interface IdentityBrokerOptions {
  storage: IStorage;
  connectors: ReadonlyMap<string, Connector>;
  /** Public base URL, without trailing slash */
  issuer: string;
  logger?: Logger;
  authRequestTtlMs?: number;
  authCodeTtlMs?: number;
  now?: () => Date;
}

/**
 * Create the identity broker application
 */
export function createIdentityBroker(options: IdentityBrokerOptions): Hono<BrokerEnv> {
  const {
    storage,
    connectors,
    issuer,
    logger = noopLogger,
    authRequestTtlMs = DEFAULT_AUTH_REQUEST_TTL_MS,
    authCodeTtlMs = DEFAULT_AUTH_CODE_TTL_MS,
    now = () => new Date(),
  } = options;

  const app = new Hono<BrokerEnv>();

  // Global error handler
  app.onError(oauthErrorHandler(logger));

  app.use('*', requestLogger(logger));
  app.use('*', securityHeaders());

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route(
    '/auth',
    createLoginRoutes({ storage, connectors, issuer, authRequestTtlMs, now })
  );

  app.route('/callback', createCallbackRoutes({ storage, connectors, authCodeTtlMs, now }));

  app.route('/keys', createJWKSRoutes({ keyStorage: storage.keys, now }));

  return app;
}
