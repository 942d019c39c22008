import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { BrokerEnv } from '../../types/hono.js';
import type { IStorage } from '../../storage/interfaces/index.js';
import type { AuthRequest } from '../../types/storage.js';
import type { Connector } from '../../connectors/types.js';
import { parseConnectorScopes } from '../../types/identity.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { isNotFound } from '../../errors/storage-error.js';
import { generateId } from '../../crypto/random.js';
import { OPENID_SCOPE } from '../../config/constants.js';

export interface LoginRoutesOptions {
  storage: IStorage;
  connectors: ReadonlyMap<string, Connector>;
  issuer: string;
  authRequestTtlMs: number;
  now: () => Date;
}

const loginQuerySchema = z.object({
  client_id: z.string().min(1),
  redirect_uri: z.string().url(),
  response_type: z.string().default('code'),
  scope: z.string().default(OPENID_SCOPE),
  state: z.string().default(''),
  nonce: z.string().default(''),
  code_challenge: z.string().default(''),
  code_challenge_method: z.enum(['plain', 'S256', '']).default(''),
});

/**
 * Callback URL registered with the upstream provider for a connector
 */
export function callbackURL(issuer: string, connectorId: string): string {
  return `${issuer}/callback/${encodeURIComponent(connectorId)}`;
}

/**
 * Create login routes
 *
 * GET /auth/:connectorId
 */
export function createLoginRoutes(options: LoginRoutesOptions): Hono<BrokerEnv> {
  const { storage, connectors, issuer, authRequestTtlMs, now } = options;
  const app = new Hono<BrokerEnv>();

  app.get(
    '/:connectorId',
    zValidator('query', loginQuerySchema, (result) => {
      if (!result.success) {
        const details = result.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join(', ');
        throw OAuthError.invalidRequest(details);
      }
    }),
    async (c) => {
      const connectorId = c.req.param('connectorId');
      const query = c.req.valid('query');

      const connector = connectors.get(connectorId);
      if (!connector) {
        throw OAuthError.notFound(`Unknown connector: ${connectorId}`);
      }

      const client = await storage.clients.get(query.client_id).catch((err: unknown) => {
        if (isNotFound(err)) {
          throw OAuthError.unauthorizedClient(`Unknown client: ${query.client_id}`);
        }
        throw err;
      });

      if (!client.redirectURIs.includes(query.redirect_uri)) {
        throw OAuthError.invalidRequest('Unregistered redirect_uri', query.state);
      }

      const scopes = query.scope.split(' ').filter(Boolean);
      const id = generateId();

      // The auth request id doubles as the upstream state parameter
      const login = connector.loginURL(
        parseConnectorScopes(query.scope),
        callbackURL(issuer, connectorId),
        id
      );

      const authRequest: AuthRequest = {
        id,
        clientId: client.id,
        responseTypes: [query.response_type],
        scopes,
        redirectURI: query.redirect_uri,
        nonce: query.nonce,
        state: query.state,
        forceApprovalPrompt: false,
        expiry: new Date(now().getTime() + authRequestTtlMs),
        loggedIn: false,
        connectorId,
        connectorData: login.connectorData,
        pkce: {
          codeChallenge: query.code_challenge,
          codeChallengeMethod: query.code_challenge_method,
        },
      };

      await storage.authRequests.create(authRequest);

      c.get('logger').debug('auth request created', {
        authRequestId: id,
        clientId: client.id,
        connectorId,
      });

      return c.redirect(login.url, 302);
    }
  );

  return app;
}
