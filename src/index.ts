// Export for programmatic use
export { createIdentityBroker, type IdentityBrokerOptions } from './app.js';
export * from './storage/index.js';
export * from './types/identity.js';
export type {
  PKCE,
  Client,
  AuthRequest,
  AuthCode,
  RefreshToken,
  RefreshTokenRef,
  OfflineSessions,
  Password,
  Connector as StoredConnector,
  DeviceTokenStatus,
  DeviceRequest,
  DeviceToken,
  VerificationKey,
  Keys,
  GCResult,
} from './types/storage.js';
export { isEmptyGCResult, emptyKeys } from './types/storage.js';
export type { BrokerEnv, BrokerVariables, BrokerContext } from './types/hono.js';
export * from './connectors/types.js';
export { GitLabConnector, gitlabConfigSchema, type GitLabConfig } from './connectors/gitlab.js';
export {
  GoogleConnector,
  googleConfigSchema,
  type GoogleConfig,
  type GoogleConnectorOptions,
} from './connectors/google.js';
export type { DirectoryClient, DirectoryClientFactory } from './connectors/google-directory.js';
export { openConnector, openStoredConnector, connectorTypes } from './connectors/registry.js';
export { filterGroups, applyGroupPolicy } from './connectors/groups.js';
export * from './errors/connector-error.js';
export * from './errors/storage-error.js';
export { OAuthError } from './errors/oauth-error.js';
export * from './services/gc-service.js';
export * from './services/key-rotation-service.js';
export * from './services/refresh-token-service.js';
export * from './services/connector-service.js';
export { buildJwks, generateRsaKeyPair, signIdToken, verifyIdToken } from './crypto/jwt.js';
export { createConsoleLogger, noopLogger, type Logger, type LogLevel } from './utils/logger.js';
export { loadConfig, getConfig, resetConfig, type Config } from './config/index.js';
