import { z } from 'zod';
import * as jose from 'jose';
import type { ConnectorScopes, Identity } from '../types/identity.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';
import {
  ConfigurationError,
  PolicyViolationError,
  UpstreamMalformedError,
  UpstreamRejectedError,
  UpstreamUnreachableError,
} from '../errors/connector-error.js';
import {
  CONNECTOR_TYPE_GOOGLE,
  GOOGLE_AUTH_URL,
  GOOGLE_DIRECTORY_URL,
  GOOGLE_ISSUER,
  GOOGLE_JWKS_URL,
  GOOGLE_TOKEN_URL,
  GROUPS_SCOPE,
  OPENID_SCOPE,
} from '../config/constants.js';
import {
  type CallbackRequest,
  type Connector,
  type ConnectorOptions,
  type LoginURLResult,
  decodeConnectorData,
  encodeConnectorData,
} from './types.js';
import { OAuth2Client, type TokenResponse } from './oauth2-client.js';
import { applyGroupPolicy } from './groups.js';
import {
  type DirectoryClient,
  type DirectoryClientFactory,
  serviceAccountDirectoryFactory,
} from './google-directory.js';

export const WILDCARD_DOMAIN = '*';

export const googleConfigSchema = z.object({
  clientID: z.string().min(1),
  clientSecret: z.string().min(1),
  redirectURI: z.string().url(),
  /** Defaults to profile and email */
  scopes: z.array(z.string()).default([]),
  /** Allowed values of the hd claim */
  hostedDomains: z.array(z.string()).default([]),
  groups: z.array(z.string()).default([]),
  /** Service account key file; GOOGLE_APPLICATION_CREDENTIALS when unset */
  serviceAccountFilePath: z.string().optional(),
  /** @deprecated use domainToAdminEmail with the "*" key */
  adminEmail: z.string().optional(),
  domainToAdminEmail: z.record(z.string()).default({}),
  fetchTransitiveGroupMembership: z.boolean().default(false),
  issuer: z.string().url().default(GOOGLE_ISSUER),
  authURL: z.string().url().default(GOOGLE_AUTH_URL),
  tokenURL: z.string().url().default(GOOGLE_TOKEN_URL),
  jwksURL: z.string().url().default(GOOGLE_JWKS_URL),
  directoryURL: z.string().url().default(GOOGLE_DIRECTORY_URL),
});

export type GoogleConfig = z.input<typeof googleConfigSchema>;
export type GoogleSettings = z.output<typeof googleConfigSchema>;

export interface GoogleConnectorOptions extends ConnectorOptions {
  /** Keys that verify Google ID tokens */
  jwks?: jose.JWTVerifyGetKey;
  /** Builds the directory client that impersonates an admin */
  directoryClientFactory?: DirectoryClientFactory;
}

const idTokenClaimsSchema = z.object({
  sub: z.string(),
  name: z.string().optional(),
  email: z.string().default(''),
  email_verified: z.boolean().default(false),
  hd: z.string().optional(),
});

const connectorDataSchema = z.object({
  refreshToken: z.string(),
});

/**
 * Logs users in through Google's OpenID Connect provider, resolving groups
 * through the Admin SDK Directory API
 */
export class GoogleConnector implements Connector {
  readonly type = CONNECTOR_TYPE_GOOGLE;
  private readonly logger: Logger;
  private readonly jwks: jose.JWTVerifyGetKey;
  private readonly directory: ReadonlyMap<string, DirectoryClient>;
  private readonly scopes: string[];

  constructor(
    readonly id: string,
    private readonly config: GoogleSettings,
    options: GoogleConnectorOptions = {}
  ) {
    this.logger = (options.logger ?? noopLogger).child({ connector: { type: this.type, id } });
    this.jwks = options.jwks ?? jose.createRemoteJWKSet(new URL(config.jwksURL));
    this.scopes = [OPENID_SCOPE, ...(config.scopes.length > 0 ? config.scopes : ['profile', 'email'])];

    if (config.scopes.includes(GROUPS_SCOPE)) {
      this.logger.warn('"scopes" contain "groups" which Google does not support');
    }

    const domainToAdminEmail = { ...config.domainToAdminEmail };
    if (config.adminEmail) {
      this.logger.warn(
        `"adminEmail" is deprecated, use "domainToAdminEmail.${WILDCARD_DOMAIN}: ${config.adminEmail}"`
      );
      domainToAdminEmail[WILDCARD_DOMAIN] = config.adminEmail;
    }

    this.directory = this.openDirectory(domainToAdminEmail, options.directoryClientFactory);
  }

  loginURL(scopes: ConnectorScopes, callbackURL: string, state: string): LoginURLResult {
    if (callbackURL !== this.config.redirectURI) {
      throw new ConfigurationError(
        `google: callback URL "${callbackURL}" does not match configured redirect URI "${this.config.redirectURI}"`
      );
    }

    const extra: Record<string, string> = {};
    const [firstDomain] = this.config.hostedDomains;
    if (firstDomain !== undefined) {
      extra['hd'] = this.config.hostedDomains.length > 1 ? WILDCARD_DOMAIN : firstDomain;
    }

    if (scopes.offlineAccess) {
      extra['access_type'] = 'offline';
      extra['prompt'] = 'consent';
    }

    return { url: this.oauth2Client().authCodeURL(state, extra) };
  }

  async handleCallback(
    scopes: ConnectorScopes,
    _connectorData: Uint8Array | undefined,
    request: CallbackRequest
  ): Promise<Identity> {
    const error = request.query.get('error');
    if (error) {
      throw new UpstreamRejectedError(error, request.query.get('error_description') ?? '');
    }

    const code = request.query.get('code');
    if (!code) {
      throw new UpstreamMalformedError('google: callback is missing the code parameter');
    }

    const token = await this.oauth2Client().exchange(code, request.signal);
    return this.identity(scopes, token, request.signal);
  }

  async refresh(scopes: ConnectorScopes, identity: Identity, signal?: AbortSignal): Promise<Identity> {
    const { refreshToken } = this.parseConnectorData(identity.connectorData);
    const token = await this.oauth2Client().refresh(refreshToken, signal);

    // Google only returns a refresh token on the first consent
    return this.identity(scopes, { ...token, refresh_token: token.refresh_token ?? refreshToken }, signal);
  }

  private oauth2Client(): OAuth2Client {
    return new OAuth2Client({
      label: this.type,
      clientID: this.config.clientID,
      clientSecret: this.config.clientSecret,
      redirectURI: this.config.redirectURI,
      scopes: this.scopes,
      authURL: this.config.authURL,
      tokenURL: this.config.tokenURL,
    });
  }

  private openDirectory(
    domainToAdminEmail: Record<string, string>,
    factory: DirectoryClientFactory | undefined
  ): ReadonlyMap<string, DirectoryClient> {
    const entries = Object.entries(domainToAdminEmail);

    if (entries.length === 0) {
      if (this.config.serviceAccountFilePath) {
        throw new ConfigurationError(
          'google: directory service requires the domainToAdminEmail option to be configured'
        );
      }
      if (this.config.groups.length > 0) {
        this.logger.warn('"groups" is set but no directory service is configured, it will be ignored');
      }
      return new Map();
    }

    const create = factory ?? this.defaultDirectoryFactory();
    const clients = new Map<string, DirectoryClient>();
    for (const [domain, adminEmail] of entries) {
      this.logger.debug('configuring directory service', { domain, adminEmail });
      clients.set(domain, create(adminEmail));
    }
    return clients;
  }

  private defaultDirectoryFactory(): DirectoryClientFactory {
    const path = this.config.serviceAccountFilePath ?? process.env['GOOGLE_APPLICATION_CREDENTIALS'];
    if (!path) {
      throw new ConfigurationError(
        'google: domainToAdminEmail is set but no service account credentials were provided'
      );
    }
    return serviceAccountDirectoryFactory(path, this.config.directoryURL);
  }

  private async identity(
    scopes: ConnectorScopes,
    token: TokenResponse,
    signal?: AbortSignal
  ): Promise<Identity> {
    if (!token.id_token) {
      throw new UpstreamMalformedError('google: no id_token in token response');
    }

    const claims = await this.verifyIdToken(token.id_token);

    if (this.config.hostedDomains.length > 0 && !this.config.hostedDomains.includes(claims.hd ?? '')) {
      throw new PolicyViolationError(`google: unexpected hd claim "${claims.hd ?? ''}"`);
    }

    const username = claims.name || claims.email;

    let groups: string[] = [];
    if (this.directory.size > 0 && (this.config.groups.length > 0 || scopes.groups)) {
      const resolved = await this.getGroups(claims.email, new Set(), signal);
      groups = applyGroupPolicy(this.type, username, resolved, this.config.groups);
    }

    const identity: Identity = {
      userId: claims.sub,
      username,
      email: claims.email,
      emailVerified: claims.email_verified,
      groups,
    };

    if (scopes.offlineAccess && token.refresh_token) {
      identity.connectorData = encodeConnectorData({ refreshToken: token.refresh_token });
    }

    return identity;
  }

  private async verifyIdToken(idToken: string): Promise<z.infer<typeof idTokenClaimsSchema>> {
    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(idToken, this.jwks, {
        issuer: [this.config.issuer, new URL(this.config.issuer).host],
        audience: this.config.clientID,
      }));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      if (err instanceof jose.errors.JOSEError) {
        throw new UpstreamMalformedError(`google: failed to verify ID token: ${reason}`, { cause: err });
      }
      throw new UpstreamUnreachableError(`google: failed to verify ID token: ${reason}`, err);
    }

    const result = idTokenClaimsSchema.safeParse(payload);
    if (!result.success) {
      throw new UpstreamMalformedError('google: failed to decode ID token claims', { cause: result.error });
    }

    return result.data;
  }

  /**
   * Groups of a user or group. With transitive membership enabled each
   * group is itself looked up. visited is checked before recursing so
   * every group is fetched and returned once, cycles included.
   */
  private async getGroups(
    email: string,
    visited: Set<string>,
    signal?: AbortSignal
  ): Promise<string[]> {
    const directory = this.findDirectoryClient(domainOf(email));
    const groups: string[] = [];
    const seenPages = new Set<string>();
    let pageToken: string | undefined;

    do {
      const page = await directory.listGroups(email, pageToken, signal);

      for (const group of page.groups) {
        if (visited.has(group.email)) {
          continue;
        }

        visited.add(group.email);
        groups.push(group.email);

        if (!this.config.fetchTransitiveGroupMembership) {
          continue;
        }

        groups.push(...(await this.getGroups(group.email, visited, signal)));
      }

      pageToken = page.nextPageToken || undefined;
      if (pageToken !== undefined) {
        if (seenPages.has(pageToken)) {
          break;
        }
        seenPages.add(pageToken);
      }
    } while (pageToken !== undefined);

    return groups;
  }

  private findDirectoryClient(domain: string): DirectoryClient {
    const client = this.directory.get(domain);
    if (client) {
      return client;
    }

    const wildcard = this.directory.get(WILDCARD_DOMAIN);
    if (wildcard) {
      this.logger.debug('using wildcard admin email to fetch groups', { domain });
      return wildcard;
    }

    throw new ConfigurationError(
      `google: no admin email configured for domain "${domain}" and no "${WILDCARD_DOMAIN}" fallback`
    );
  }

  private parseConnectorData(raw: Uint8Array | undefined): z.infer<typeof connectorDataSchema> {
    if (!raw || raw.length === 0) {
      throw new ConfigurationError('google: identity has no connector data');
    }

    let decoded: unknown;
    try {
      decoded = decodeConnectorData(raw);
    } catch (err) {
      throw new ConfigurationError('google: unmarshal connector data', err);
    }

    const result = connectorDataSchema.safeParse(decoded);
    if (!result.success) {
      throw new ConfigurationError('google: unmarshal connector data', result.error);
    }

    return result.data;
  }
}

/**
 * Text after the last "@", or the wildcard domain when there is none
 */
export function domainOf(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : WILDCARD_DOMAIN;
}
