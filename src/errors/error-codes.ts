/**
 * OAuth 2.0 Error Codes
 * RFC 6749 Section 4.1.2.1
 */

// Authorization endpoint errors (RFC 6749 Section 4.1.2.1)
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_UNAUTHORIZED_CLIENT = 'unauthorized_client' as const;
export const ERROR_ACCESS_DENIED = 'access_denied' as const;
export const ERROR_SERVER_ERROR = 'server_error' as const;
export const ERROR_TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable' as const;

// Broker specific
export const ERROR_NOT_FOUND = 'not_found' as const;

export type OAuthErrorCode =
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_UNAUTHORIZED_CLIENT
  | typeof ERROR_ACCESS_DENIED
  | typeof ERROR_SERVER_ERROR
  | typeof ERROR_TEMPORARILY_UNAVAILABLE
  | typeof ERROR_NOT_FOUND;

export type OAuthErrorStatus = 400 | 401 | 403 | 404 | 500 | 503;

export const ERROR_STATUS_CODES: Record<OAuthErrorCode, OAuthErrorStatus> = {
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_UNAUTHORIZED_CLIENT]: 401,
  [ERROR_ACCESS_DENIED]: 403,
  [ERROR_SERVER_ERROR]: 500,
  [ERROR_TEMPORARILY_UNAVAILABLE]: 503,
  [ERROR_NOT_FOUND]: 404,
};

export const ERROR_DESCRIPTIONS: Record<OAuthErrorCode, string> = {
  [ERROR_INVALID_REQUEST]:
    'The request is missing a required parameter, includes an invalid parameter value, or is otherwise malformed.',
  [ERROR_UNAUTHORIZED_CLIENT]: 'The client is not authorized to use this connector.',
  [ERROR_ACCESS_DENIED]: 'The resource owner or authorization server denied the request.',
  [ERROR_SERVER_ERROR]:
    'The authorization server encountered an unexpected condition that prevented it from fulfilling the request.',
  [ERROR_TEMPORARILY_UNAVAILABLE]: 'The upstream identity provider could not be reached.',
  [ERROR_NOT_FOUND]: 'The requested resource does not exist.',
};
