import {
  type OAuthErrorCode,
  type OAuthErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_ACCESS_DENIED,
  ERROR_SERVER_ERROR,
  ERROR_TEMPORARILY_UNAVAILABLE,
  ERROR_NOT_FOUND,
} from './error-codes.js';
import {
  ConnectorError,
  GroupPolicyViolationError,
  UpstreamRejectedError,
} from './connector-error.js';
import { StorageError } from './storage-error.js';

/**
 * OAuth 2.0 Error Response
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
  state?: string;
}

/**
 * OAuth 2.0 Error class
 * Represents RFC-compliant OAuth errors returned by the HTTP surface
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: OAuthErrorStatus;
  public readonly description: string;
  public readonly state?: string;

  constructor(
    code: OAuthErrorCode,
    description?: string,
    options?: {
      state?: string;
      cause?: unknown;
    }
  ) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc, { cause: options?.cause });
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.state) {
      this.state = options.state;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): OAuthErrorResponse {
    const response: OAuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.state) {
      response.state = this.state;
    }

    return response;
  }

  static invalidRequest(description?: string, state?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST, description, { state });
  }

  static unauthorizedClient(description?: string): OAuthError {
    return new OAuthError(ERROR_UNAUTHORIZED_CLIENT, description);
  }

  static serverError(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_SERVER_ERROR, description, { cause });
  }

  static temporarilyUnavailable(description?: string, cause?: unknown): OAuthError {
    return new OAuthError(ERROR_TEMPORARILY_UNAVAILABLE, description, { cause });
  }

  static notFound(description?: string): OAuthError {
    return new OAuthError(ERROR_NOT_FOUND, description);
  }

  /**
   * Map a connector or storage failure onto the response a relying party sees
   */
  static fromError(err: unknown): OAuthError {
    if (err instanceof OAuthError) {
      return err;
    }

    if (err instanceof GroupPolicyViolationError) {
      return new OAuthError(
        ERROR_ACCESS_DENIED,
        'You are not a member of any group allowed to use this application.',
        { cause: err }
      );
    }

    if (err instanceof UpstreamRejectedError) {
      return new OAuthError(ERROR_ACCESS_DENIED, err.message, { cause: err });
    }

    if (err instanceof ConnectorError) {
      switch (err.kind) {
        case 'policy_violation':
          return new OAuthError(ERROR_ACCESS_DENIED, err.message, { cause: err });
        case 'upstream_unreachable':
          return OAuthError.temporarilyUnavailable(undefined, err);
        default:
          return OAuthError.serverError(undefined, err);
      }
    }

    if (err instanceof StorageError && err.kind === 'not_found') {
      return new OAuthError(ERROR_NOT_FOUND, undefined, { cause: err });
    }

    return OAuthError.serverError(undefined, err);
  }
}
