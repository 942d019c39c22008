import type { JWK } from 'jose';
import type { Claims } from './identity.js';

/**
 * Proof Key for Code Exchange parameters (RFC 7636)
 */
export interface PKCE {
  codeChallenge: string;
  codeChallengeMethod: string;
}

/**
 * OAuth2 client registered with the broker
 */
export interface Client {
  id: string;
  secret: string;
  redirectURIs: string[];
  /**
   * Peers allowed to mint tokens for this client
   */
  trustedPeers: string[];
  public: boolean;
  name: string;
  logoURL: string;
}

/**
 * State of a single authorization flow up to the point the user
 * authorizes the client
 */
export interface AuthRequest {
  id: string;
  clientId: string;
  responseTypes: string[];
  scopes: string[];
  redirectURI: string;
  nonce: string;
  state: string;
  forceApprovalPrompt: boolean;
  expiry: Date;
  /**
   * Set once the user has proved their identity through a connector.
   * Until then claims is undefined.
   */
  loggedIn: boolean;
  claims?: Claims;
  connectorId: string;
  connectorData?: Uint8Array;
  pkce: PKCE;
}

/**
 * Code exchangeable for a token response. Read once then deleted.
 */
export interface AuthCode {
  id: string;
  clientId: string;
  redirectURI: string;
  nonce: string;
  scopes: string[];
  connectorId: string;
  connectorData?: Uint8Array;
  claims: Claims;
  expiry: Date;
  pkce: PKCE;
}

/**
 * Long-lived credential tying a client to a user session
 *
 * There is no expiry field: refresh tokens are removed by revocation,
 * never by garbage collection.
 */
export interface RefreshToken {
  id: string;
  /** Rotated on every use */
  token: string;
  /** The value token held before the last rotation */
  obsoleteToken: string;
  createdAt: Date;
  lastUsed: Date;
  clientId: string;
  connectorId: string;
  connectorData?: Uint8Array;
  claims: Claims;
  scopes: string[];
  nonce: string;
}

/**
 * Reference to a refresh token held inside an offline session
 */
export interface RefreshTokenRef {
  id: string;
  clientId: string;
  createdAt: Date;
  lastUsed: Date;
}

/**
 * Sessions of users holding refresh tokens, keyed by (userId, connId)
 */
export interface OfflineSessions {
  userId: string;
  connId: string;
  /** Refresh token references indexed by client id */
  refresh: Record<string, RefreshTokenRef>;
  connectorData?: Uint8Array;
}

/**
 * Email to password mapping. Emails are stored lower-cased.
 */
export interface Password {
  email: string;
  /** bcrypt or scrypt encoded hash */
  hash: string;
  username: string;
  userId: string;
}

/**
 * Stored connector definition
 */
export interface Connector {
  id: string;
  /** Connector type, e.g. 'gitlab' or 'google' */
  type: string;
  name: string;
  resourceVersion: string;
  /** Connector-specific configuration, JSON encoded */
  config: Uint8Array;
}

export type DeviceTokenStatus = 'pending' | 'complete' | 'expired' | 'denied';

/**
 * Device authorization request (RFC 8628), keyed by user code
 */
export interface DeviceRequest {
  userCode: string;
  deviceCode: string;
  clientId: string;
  clientSecret: string;
  scopes: string[];
  expiry: Date;
}

/**
 * Token state of a device flow, keyed by device code
 */
export interface DeviceToken {
  deviceCode: string;
  status: DeviceTokenStatus;
  token: string;
  expiry: Date;
  lastRequestTime: Date;
  pollIntervalSeconds: number;
  pkce: PKCE;
}

/**
 * A rotated signing key that can still verify signatures
 */
export interface VerificationKey {
  publicKey: JWK;
  expiry: Date;
}

/**
 * Process-wide signing key material. A single logical row.
 */
export interface Keys {
  signingKey?: JWK;
  signingKeyPub?: JWK;
  verificationKeys: VerificationKey[];
  /**
   * Keys must not be rotated before this time
   */
  nextRotation: Date;
}

/**
 * Row counts removed by one garbage collection sweep
 */
export interface GCResult {
  authRequests: number;
  authCodes: number;
  deviceRequests: number;
  deviceTokens: number;
}

export function isEmptyGCResult(result: GCResult): boolean {
  return (
    result.authRequests === 0 &&
    result.authCodes === 0 &&
    result.deviceRequests === 0 &&
    result.deviceTokens === 0
  );
}

export function emptyKeys(): Keys {
  return { verificationKeys: [], nextRotation: new Date(0) };
}
