/**
 * Broker constants
 */

// Connector types
export const CONNECTOR_TYPE_GITLAB = 'gitlab' as const;
export const CONNECTOR_TYPE_GOOGLE = 'google' as const;

export const SUPPORTED_CONNECTOR_TYPES = [CONNECTOR_TYPE_GITLAB, CONNECTOR_TYPE_GOOGLE] as const;

// Signing
export const SIGNING_ALGORITHM_RS256 = 'RS256' as const;
export const RSA_MODULUS_LENGTH = 2048;

// Default TTLs (in milliseconds)
export const DEFAULT_AUTH_REQUEST_TTL_MS = 24 * 60 * 60 * 1000; // 24 hours
export const DEFAULT_AUTH_CODE_TTL_MS = 10 * 60 * 1000; // 10 minutes
export const DEFAULT_ID_TOKEN_TTL_MS = 24 * 60 * 60 * 1000; // 24 hours
export const DEFAULT_ROTATION_FREQUENCY_MS = 6 * 60 * 60 * 1000; // 6 hours
export const DEFAULT_GC_INTERVAL_MS = 5 * 60 * 1000; // 5 minutes
export const DEFAULT_KEY_CHECK_INTERVAL_MS = 30 * 1000; // 30 seconds
export const STATIC_KEY_LIFETIME_MS = 100 * 365 * 24 * 60 * 60 * 1000; // ~100 years

// Random value lengths (bytes)
export const ID_LENGTH = 16;
export const TOKEN_LENGTH = 32;
export const KEY_ID_LENGTH = 20;

// OpenID Connect scopes
export const OPENID_SCOPE = 'openid' as const;
export const GROUPS_SCOPE = 'groups' as const;
export const OFFLINE_ACCESS_SCOPE = 'offline_access' as const;

// HTTP headers
export const HEADER_CACHE_CONTROL = 'Cache-Control';
export const HEADER_PRAGMA = 'Pragma';

// Content types
export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';

export const NO_STORE = 'no-store';
export const NO_CACHE = 'no-cache';

// Upstream endpoints
export const GITLAB_DEFAULT_BASE_URL = 'https://gitlab.com';
export const GOOGLE_ISSUER = 'https://accounts.google.com';
export const GOOGLE_AUTH_URL = 'https://accounts.google.com/o/oauth2/v2/auth';
export const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const GOOGLE_JWKS_URL = 'https://www.googleapis.com/oauth2/v3/certs';
export const GOOGLE_DIRECTORY_URL = 'https://admin.googleapis.com';
export const GOOGLE_DIRECTORY_SCOPE = 'https://www.googleapis.com/auth/admin.directory.group.readonly';
export const JWT_BEARER_GRANT_TYPE = 'urn:ietf:params:oauth:grant-type:jwt-bearer' as const;
