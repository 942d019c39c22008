import type { ConnectorScopes, Identity } from '../types/identity.js';
import type { Logger } from '../utils/logger.js';

/**
 * Incoming redirect from the upstream provider
 */
export interface CallbackRequest {
  query: URLSearchParams;
  /** Aborts every upstream call made while handling the callback */
  signal?: AbortSignal;
}

export interface LoginURLResult {
  url: string;
  /** Continuation handed back to handleCallback */
  connectorData?: Uint8Array;
}

/**
 * Capability set every upstream provider integration implements.
 *
 * Instances hold configuration only. Per-flow state travels through the
 * arguments, so one instance serves concurrent logins.
 */
export interface Connector {
  readonly id: string;
  readonly type: string;

  /**
   * Build the upstream authorization URL.
   * Throws ConfigurationError when callbackURL differs from the configured
   * redirect URI.
   */
  loginURL(scopes: ConnectorScopes, callbackURL: string, state: string): LoginURLResult;

  /**
   * Turn the upstream redirect into an Identity
   */
  handleCallback(
    scopes: ConnectorScopes,
    connectorData: Uint8Array | undefined,
    request: CallbackRequest
  ): Promise<Identity>;

  /**
   * Re-derive an Identity from the connectorData of a previous one
   */
  refresh(scopes: ConnectorScopes, identity: Identity, signal?: AbortSignal): Promise<Identity>;
}

export interface ConnectorOptions {
  logger?: Logger;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encodeConnectorData(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

export function decodeConnectorData(data: Uint8Array): unknown {
  return JSON.parse(decoder.decode(data));
}
