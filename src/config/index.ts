import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { JWK } from 'jose';
import type { StorageConfig } from '../storage/index.js';
import type { SigningKeyPair } from '../crypto/jwt.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';
import * as constants from './constants.js';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(envVar: string): string | undefined {
  const filePath = process.env[`${envVar}_FILE`];

  if (filePath && existsSync(filePath)) {
    return readFileSync(filePath, 'utf-8').trim();
  }

  return process.env[envVar];
}

function readInt(envVar: string, fallback: number): number {
  const raw = process.env[envVar];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`config: ${envVar} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    /** Public base URL; callback URLs are derived from it */
    issuer: string;
  };
  storage: StorageConfig;
  logging: {
    level: LogLevel;
  };
  gc: {
    intervalMs: number;
  };
  keys: {
    rotationFrequencyMs: number;
    idTokenValidForMs: number;
    checkIntervalMs: number;
    /** Fixed signing key; disables rotation when set */
    staticKey?: SigningKeyPair;
  };
  authRequestTtlMs: number;
  authCodeTtlMs: number;
  connectorsFile?: string;
  clientsFile?: string;
}

function loadStorageConfig(): StorageConfig {
  const type = process.env['STORAGE'] || 'memory';
  switch (type) {
    case 'memory':
      return { type: 'memory' };
    case 'sqlite':
      return { type: 'sqlite', path: process.env['SQLITE_PATH'] || 'idbroker.db' };
    default:
      throw new Error(`config: unsupported STORAGE "${type}", expected memory or sqlite`);
  }
}

function loadLogLevel(): LogLevel {
  const level = process.env['LOG_LEVEL'] || 'info';
  if (!isLogLevel(level)) {
    throw new Error(`config: unsupported LOG_LEVEL "${level}"`);
  }
  return level;
}

const privateJwkSchema = z
  .object({
    kty: z.literal('RSA'),
    kid: z.string().min(1),
    n: z.string(),
    e: z.string(),
    d: z.string(),
  })
  .passthrough();

/**
 * Parse a private RSA JWK and derive its public half
 */
export function parseSigningKey(raw: string): SigningKeyPair {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error('config: SIGNING_KEY is not valid JSON', { cause: err });
  }

  const result = privateJwkSchema.safeParse(json);
  if (!result.success) {
    throw new Error('config: SIGNING_KEY must be a private RSA JWK with a kid', {
      cause: result.error,
    });
  }

  const signingKey: JWK = {
    ...result.data,
    alg: constants.SIGNING_ALGORITHM_RS256,
    use: 'sig',
  };
  const signingKeyPub: JWK = {
    kty: result.data.kty,
    kid: result.data.kid,
    n: result.data.n,
    e: result.data.e,
    alg: constants.SIGNING_ALGORITHM_RS256,
    use: 'sig',
  };

  return { signingKey, signingKeyPub };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const port = readInt('PORT', 5556);
  const signingKey = readSecret('SIGNING_KEY');

  return {
    server: {
      port,
      host: process.env['HOST'] || '0.0.0.0',
      issuer: (process.env['ISSUER'] || `http://localhost:${port}`).replace(/\/+$/, ''),
    },
    storage: loadStorageConfig(),
    logging: {
      level: loadLogLevel(),
    },
    gc: {
      intervalMs: readInt('GC_INTERVAL_MS', constants.DEFAULT_GC_INTERVAL_MS),
    },
    keys: {
      rotationFrequencyMs: readInt(
        'KEY_ROTATION_FREQUENCY_MS',
        constants.DEFAULT_ROTATION_FREQUENCY_MS
      ),
      idTokenValidForMs: readInt('ID_TOKEN_TTL_MS', constants.DEFAULT_ID_TOKEN_TTL_MS),
      checkIntervalMs: readInt('KEY_CHECK_INTERVAL_MS', constants.DEFAULT_KEY_CHECK_INTERVAL_MS),
      staticKey: signingKey ? parseSigningKey(signingKey) : undefined,
    },
    authRequestTtlMs: readInt('AUTH_REQUEST_TTL_MS', constants.DEFAULT_AUTH_REQUEST_TTL_MS),
    authCodeTtlMs: readInt('AUTH_CODE_TTL_MS', constants.DEFAULT_AUTH_CODE_TTL_MS),
    connectorsFile: process.env['CONNECTORS_FILE'],
    clientsFile: process.env['CLIENTS_FILE'],
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
