import { sqliteTable, text, integer, blob, index } from 'drizzle-orm/sqlite-core';
import type { JWK } from 'jose';
import type { Claims } from '../../types/identity.js';
import type { DeviceTokenStatus } from '../../types/storage.js';

/**
 * Timestamps are stored as UTC epoch milliseconds
 */

// JSON columns cannot hold Date values
export interface StoredRefreshTokenRef {
  id: string;
  clientId: string;
  createdAt: number;
  lastUsed: number;
}

export interface StoredVerificationKey {
  publicKey: JWK;
  expiry: number;
}

export const authRequests = sqliteTable(
  'auth_requests',
  {
    id: text('id').primaryKey(),
    clientId: text('client_id').notNull(),
    responseTypes: text('response_types', { mode: 'json' }).$type<string[]>().notNull(),
    scopes: text('scopes', { mode: 'json' }).$type<string[]>().notNull(),
    redirectURI: text('redirect_uri').notNull(),
    nonce: text('nonce').notNull(),
    state: text('state').notNull(),
    forceApprovalPrompt: integer('force_approval_prompt', { mode: 'boolean' }).notNull(),
    loggedIn: integer('logged_in', { mode: 'boolean' }).notNull(),
    claims: text('claims', { mode: 'json' }).$type<Claims>(),
    connectorId: text('connector_id').notNull(),
    connectorData: blob('connector_data', { mode: 'buffer' }),
    codeChallenge: text('code_challenge').notNull(),
    codeChallengeMethod: text('code_challenge_method').notNull(),
    expiry: integer('expiry', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('auth_requests_expiry_idx').on(table.expiry)]
);

export const authCodes = sqliteTable(
  'auth_codes',
  {
    id: text('id').primaryKey(),
    clientId: text('client_id').notNull(),
    scopes: text('scopes', { mode: 'json' }).$type<string[]>().notNull(),
    redirectURI: text('redirect_uri').notNull(),
    nonce: text('nonce').notNull(),
    claims: text('claims', { mode: 'json' }).$type<Claims>().notNull(),
    connectorId: text('connector_id').notNull(),
    connectorData: blob('connector_data', { mode: 'buffer' }),
    codeChallenge: text('code_challenge').notNull(),
    codeChallengeMethod: text('code_challenge_method').notNull(),
    expiry: integer('expiry', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('auth_codes_expiry_idx').on(table.expiry)]
);

export const refreshTokens = sqliteTable('refresh_tokens', {
  id: text('id').primaryKey(),
  token: text('token').notNull(),
  obsoleteToken: text('obsolete_token').notNull(),
  createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  lastUsed: integer('last_used', { mode: 'timestamp_ms' }).notNull(),
  clientId: text('client_id').notNull(),
  connectorId: text('connector_id').notNull(),
  connectorData: blob('connector_data', { mode: 'buffer' }),
  claims: text('claims', { mode: 'json' }).$type<Claims>().notNull(),
  scopes: text('scopes', { mode: 'json' }).$type<string[]>().notNull(),
  nonce: text('nonce').notNull(),
});

export const deviceRequests = sqliteTable(
  'device_requests',
  {
    userCode: text('user_code').primaryKey(),
    deviceCode: text('device_code').notNull(),
    clientId: text('client_id').notNull(),
    clientSecret: text('client_secret').notNull(),
    scopes: text('scopes', { mode: 'json' }).$type<string[]>().notNull(),
    expiry: integer('expiry', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('device_requests_expiry_idx').on(table.expiry)]
);

export const deviceTokens = sqliteTable(
  'device_tokens',
  {
    deviceCode: text('device_code').primaryKey(),
    status: text('status').$type<DeviceTokenStatus>().notNull(),
    token: text('token').notNull(),
    expiry: integer('expiry', { mode: 'timestamp_ms' }).notNull(),
    lastRequestTime: integer('last_request_time', { mode: 'timestamp_ms' }).notNull(),
    pollIntervalSeconds: integer('poll_interval_seconds').notNull(),
    codeChallenge: text('code_challenge').notNull(),
    codeChallengeMethod: text('code_challenge_method').notNull(),
  },
  (table) => [index('device_tokens_expiry_idx').on(table.expiry)]
);

export const clients = sqliteTable('clients', {
  id: text('id').primaryKey(),
  secret: text('secret').notNull(),
  redirectURIs: text('redirect_uris', { mode: 'json' }).$type<string[]>().notNull(),
  trustedPeers: text('trusted_peers', { mode: 'json' }).$type<string[]>().notNull(),
  public: integer('public', { mode: 'boolean' }).notNull(),
  name: text('name').notNull(),
  logoURL: text('logo_url').notNull(),
});

export const connectors = sqliteTable('connectors', {
  id: text('id').primaryKey(),
  type: text('type').notNull(),
  name: text('name').notNull(),
  resourceVersion: text('resource_version').notNull(),
  config: blob('config', { mode: 'buffer' }).notNull(),
});

export const passwords = sqliteTable('passwords', {
  email: text('email').primaryKey(),
  hash: text('hash').notNull(),
  username: text('username').notNull(),
  userId: text('user_id').notNull(),
});

export const offlineSessions = sqliteTable('offline_sessions', {
  id: text('id').primaryKey(),
  userId: text('user_id').notNull(),
  connId: text('conn_id').notNull(),
  refresh: text('refresh', { mode: 'json' }).$type<Record<string, StoredRefreshTokenRef>>().notNull(),
  connectorData: blob('connector_data', { mode: 'buffer' }),
});

export const keys = sqliteTable('keys', {
  id: text('id').primaryKey(),
  signingKey: text('signing_key', { mode: 'json' }).$type<JWK>(),
  signingKeyPub: text('signing_key_pub', { mode: 'json' }).$type<JWK>(),
  verificationKeys: text('verification_keys', { mode: 'json' }).$type<StoredVerificationKey[]>().notNull(),
  nextRotation: integer('next_rotation', { mode: 'timestamp_ms' }).notNull(),
});

export type AuthRequestRow = typeof authRequests.$inferSelect;
export type AuthCodeRow = typeof authCodes.$inferSelect;
export type RefreshTokenRow = typeof refreshTokens.$inferSelect;
export type DeviceRequestRow = typeof deviceRequests.$inferSelect;
export type DeviceTokenRow = typeof deviceTokens.$inferSelect;
export type ClientRow = typeof clients.$inferSelect;
export type ConnectorRow = typeof connectors.$inferSelect;
export type PasswordRow = typeof passwords.$inferSelect;
export type OfflineSessionRow = typeof offlineSessions.$inferSelect;
export type KeysRow = typeof keys.$inferSelect;
