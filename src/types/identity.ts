/**
 * Scopes requested by the relying party that change what a connector fetches
 */
export interface ConnectorScopes {
  /**
   * The client asked for offline_access; the connector must return
   * connectorData that lets it refresh the identity later
   */
  offlineAccess: boolean;

  /**
   * The client asked for the groups claim
   */
  groups: boolean;
}

/**
 * Canonical, provider-agnostic representation of an authenticated end user
 *
 * Produced fresh by every successful callback or refresh; never mutated.
 */
export interface Identity {
  /** Provider-scoped identifier, stable across logins */
  userId: string;
  /** Display name, falls back to email when the provider has none */
  username: string;
  preferredUsername?: string;
  email: string;
  emailVerified: boolean;
  groups: string[];
  /**
   * Opaque connector state needed to refresh. Only the connector that
   * produced it may interpret the bytes.
   */
  connectorData?: Uint8Array;
}

/**
 * ID token claims persisted alongside codes and refresh tokens
 */
export interface Claims {
  userId: string;
  username: string;
  preferredUsername?: string;
  email: string;
  emailVerified: boolean;
  groups: string[];
}

/**
 * Strip connector state from an identity
 */
export function claimsFromIdentity(identity: Identity): Claims {
  return {
    userId: identity.userId,
    username: identity.username,
    preferredUsername: identity.preferredUsername,
    email: identity.email,
    emailVerified: identity.emailVerified,
    groups: [...identity.groups],
  };
}

/**
 * Parse a space separated scope string into connector scopes
 */
export function parseConnectorScopes(scope: string | undefined): ConnectorScopes {
  const scopes = (scope ?? '').split(' ').filter(Boolean);
  return {
    offlineAccess: scopes.includes('offline_access'),
    groups: scopes.includes('groups'),
  };
}
