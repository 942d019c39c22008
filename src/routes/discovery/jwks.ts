import { Hono } from 'hono';
import type { BrokerEnv } from '../../types/hono.js';
import type { IKeyStorage } from '../../storage/interfaces/index.js';
import { buildJwks } from '../../crypto/jwt.js';
import { isNotFound } from '../../errors/storage-error.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { HEADER_CACHE_CONTROL } from '../../config/constants.js';

export interface JWKSRouteOptions {
  keyStorage: IKeyStorage;
  now?: () => Date;
}

/**
 * Create JWKS endpoint
 *
 * GET /keys
 */
export function createJWKSRoutes(options: JWKSRouteOptions): Hono<BrokerEnv> {
  const { keyStorage, now = () => new Date() } = options;

  const router = new Hono<BrokerEnv>();

  router.get('/', async (c) => {
    const keys = await keyStorage.get().catch((err: unknown) => {
      if (isNotFound(err)) {
        throw OAuthError.temporarilyUnavailable('Signing keys have not been generated yet.', err);
      }
      throw err;
    });

    // Clients may cache the set until the next rotation
    const maxAge = Math.max(0, Math.floor((keys.nextRotation.getTime() - now().getTime()) / 1000));
    c.header(HEADER_CACHE_CONTROL, `max-age=${maxAge}, must-revalidate`);

    return c.json(buildJwks(keys));
  });

  return router;
}
