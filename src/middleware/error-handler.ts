import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { BrokerEnv } from '../types/hono.js';
import type { Logger } from '../utils/logger.js';
import { OAuthError } from '../errors/oauth-error.js';
import { generateId } from '../crypto/random.js';
import { HEADER_CACHE_CONTROL, HEADER_PRAGMA, NO_STORE, NO_CACHE } from '../config/constants.js';

/**
 * Global error handler
 *
 * Maps connector and storage failures onto OAuth error responses. The
 * detailed message is logged; the response carries only the public
 * description.
 */
export function oauthErrorHandler(logger: Logger): ErrorHandler<BrokerEnv> {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    const oauthError = OAuthError.fromError(err);
    const log = c.get('logger') ?? logger;
    const fields = { error: err, code: oauthError.code, status: oauthError.statusCode };

    if (oauthError.statusCode >= 500) {
      log.error(err.message, fields);
    } else {
      log.warn(err.message, fields);
    }

    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, NO_STORE);
    c.header(HEADER_PRAGMA, NO_CACHE);

    return c.json(oauthError.toJSON(), oauthError.statusCode);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<BrokerEnv> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware. Binds a request-scoped logger for the
 * handlers downstream.
 */
export function requestLogger(logger: Logger): MiddlewareHandler<BrokerEnv> {
  return async (c, next) => {
    const start = Date.now();
    const requestId = generateId();
    const log = logger.child({ requestId });

    c.set('requestId', requestId);
    c.set('logger', log);

    await next();

    // Query strings carry codes and state; log the path only
    log.info('request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration: Date.now() - start,
    });
  };
}
