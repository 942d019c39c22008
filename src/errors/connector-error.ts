/**
 * Failure categories of the connector contract
 */
export type ConnectorErrorKind =
  | 'upstream_rejected'
  | 'upstream_unreachable'
  | 'upstream_malformed'
  | 'policy_violation'
  | 'configuration';

/**
 * Base class for every error surfaced by a connector
 */
export class ConnectorError extends Error {
  public readonly kind: ConnectorErrorKind;

  constructor(kind: ConnectorErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectorError';
    this.kind = kind;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The upstream provider declined the login (e.g. the user denied consent).
 * Carries the provider's own error code and description.
 */
export class UpstreamRejectedError extends ConnectorError {
  public readonly upstreamError: string;
  public readonly upstreamDescription: string;

  constructor(upstreamError: string, upstreamDescription = '') {
    super(
      'upstream_rejected',
      upstreamDescription ? `${upstreamError}: ${upstreamDescription}` : upstreamError
    );
    this.name = 'UpstreamRejectedError';
    this.upstreamError = upstreamError;
    this.upstreamDescription = upstreamDescription;
  }
}

/**
 * Transport failure or cancellation while calling the provider
 */
export class UpstreamUnreachableError extends ConnectorError {
  constructor(message: string, cause?: unknown) {
    super('upstream_unreachable', message, { cause });
    this.name = 'UpstreamUnreachableError';
  }
}

/**
 * Unexpected status or undecodable body from the provider
 */
export class UpstreamMalformedError extends ConnectorError {
  public readonly status?: number;
  public readonly body?: string;

  constructor(message: string, options?: { status?: number; body?: string; cause?: unknown }) {
    super('upstream_malformed', message, { cause: options?.cause });
    this.name = 'UpstreamMalformedError';
    this.status = options?.status;
    this.body = options?.body;
  }
}

/**
 * The user authenticated but a connector policy refuses them
 */
export class PolicyViolationError extends ConnectorError {
  constructor(message: string) {
    super('policy_violation', message);
    this.name = 'PolicyViolationError';
  }
}

/**
 * The user is not a member of any allow-listed group.
 *
 * The message names the user for operator logs. The required groups are
 * never part of it.
 */
export class GroupPolicyViolationError extends PolicyViolationError {
  public readonly username: string;

  constructor(connectorType: string, username: string) {
    super(`${connectorType}: user "${username}" is not in any of the required groups`);
    this.name = 'GroupPolicyViolationError';
    this.username = username;
  }
}

/**
 * Invalid connector configuration or unusable connector state
 */
export class ConfigurationError extends ConnectorError {
  constructor(message: string, cause?: unknown) {
    super('configuration', message, { cause });
    this.name = 'ConfigurationError';
  }
}
