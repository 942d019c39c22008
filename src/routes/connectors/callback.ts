import { Hono } from 'hono';
import type { BrokerEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { AuthCode, AuthRequest, OfflineSessions } from '../../types/storage.js';
import type { Identity } from '../../types/identity.js';
import type { Connector } from '../../connectors/types.js';
import { claimsFromIdentity, parseConnectorScopes } from '../../types/identity.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { isNotFound } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';
import { OFFLINE_ACCESS_SCOPE } from '../../config/constants.js';

export interface CallbackRoutesOptions {
  storage: IStorage;
  connectors: ReadonlyMap<string, Connector>;
  authCodeTtlMs: number;
  now: () => Date;
}

/**
 * Create connector callback routes
 *
 * GET /callback/:connectorId
 *
 * Completes the auth request with the identity the connector returns,
 * swaps it for an authorization code and redirects to the client.
 */
export function createCallbackRoutes(options: CallbackRoutesOptions): Hono<BrokerEnv> {
  const { storage, connectors, authCodeTtlMs, now } = options;
  const app = new Hono<BrokerEnv>();

  app.get('/:connectorId', async (c) => {
    const connectorId = c.req.param('connectorId');
    const log = c.get('logger');

    const connector = connectors.get(connectorId);
    if (!connector) {
      throw OAuthError.notFound(`Unknown connector: ${connectorId}`);
    }

    const state = c.req.query('state');
    if (!state) {
      throw OAuthError.invalidRequest('Missing required parameter: state');
    }

    const authRequest = await storage.authRequests.get(state).catch((err: unknown) => {
      if (isNotFound(err)) {
        throw OAuthError.invalidRequest('Unknown or expired login session');
      }
      throw err;
    });

    if (authRequest.connectorId !== connectorId) {
      throw OAuthError.invalidRequest('Login session belongs to another connector');
    }
    if (authRequest.expiry < now()) {
      throw OAuthError.invalidRequest('Unknown or expired login session');
    }

    const identity = await connector.handleCallback(
      parseConnectorScopes(authRequest.scopes.join(' ')),
      authRequest.connectorData,
      { query: new URL(c.req.url).searchParams, signal: c.req.raw.signal }
    );

    const completed = await storage.authRequests.update(authRequest.id, (old) => ({
      ...old,
      loggedIn: true,
      claims: claimsFromIdentity(identity),
      connectorData: identity.connectorData,
    }));

    log.info('login successful', {
      connectorId,
      userId: identity.userId,
      groups: identity.groups.length,
    });

    if (completed.scopes.includes(OFFLINE_ACCESS_SCOPE) && identity.connectorData) {
      await saveOfflineSession(storage, connectorId, identity);
    }

    const code = await issueAuthCode(storage, completed, identity, authCodeTtlMs, now());
    await storage.authRequests.delete(completed.id);

    const redirect = new URL(completed.redirectURI);
    redirect.searchParams.set('code', code.id);
    if (completed.state) {
      redirect.searchParams.set('state', completed.state);
    }

    return c.redirect(redirect.toString(), 302);
  });

  return app;
}

async function issueAuthCode(
  storage: IStorage,
  authRequest: AuthRequest,
  identity: Identity,
  ttlMs: number,
  now: Date
): Promise<AuthCode> {
  const code: AuthCode = {
    id: generateId(),
    clientId: authRequest.clientId,
    redirectURI: authRequest.redirectURI,
    nonce: authRequest.nonce,
    scopes: authRequest.scopes,
    connectorId: authRequest.connectorId,
    connectorData: identity.connectorData,
    claims: claimsFromIdentity(identity),
    expiry: new Date(now.getTime() + ttlMs),
    pkce: authRequest.pkce,
  };

  await storage.authCodes.create(code);
  return code;
}

/**
 * Keep the latest connector data for the user so refresh tokens issued
 * later can refresh the identity
 */
async function saveOfflineSession(
  storage: IStorage,
  connectorId: string,
  identity: Identity
): Promise<void> {
  try {
    await storage.offlineSessions.update(identity.userId, connectorId, (old) => ({
      ...old,
      connectorData: identity.connectorData,
    }));
  } catch (err) {
    if (!isNotFound(err)) {
      throw err;
    }

    const session: OfflineSessions = {
      userId: identity.userId,
      connId: connectorId,
      refresh: {},
      connectorData: identity.connectorData,
    };
    await storage.offlineSessions.create(session);
  }
}
