import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import * as jose from 'jose';
import {
  GoogleConnector,
  googleConfigSchema,
  domainOf,
  type GoogleConfig,
} from '../../connectors/google.js';
import type { DirectoryClient, DirectoryGroupsPage } from '../../connectors/google-directory.js';
import { decodeConnectorData, encodeConnectorData } from '../../connectors/types.js';
import type { ConnectorScopes, Identity } from '../../types/identity.js';
import {
  ConfigurationError,
  GroupPolicyViolationError,
  PolicyViolationError,
  UpstreamMalformedError,
} from '../../errors/connector-error.js';
import { stubFetch, jsonResponse } from '../helpers/fake-fetch.js';

const REDIRECT_URI = 'https://broker.example.com/callback/google';
const TOKEN_URL = 'https://oauth2.googleapis.com/token';

const NO_SCOPES: ConnectorScopes = { offlineAccess: false, groups: false };
const GROUP_SCOPES: ConnectorScopes = { offlineAccess: false, groups: true };
const OFFLINE_SCOPES: ConnectorScopes = { offlineAccess: true, groups: false };

/**
 * Directory with fixed memberships. Each key maps to its pages of groups.
 */
class FakeDirectory implements DirectoryClient {
  readonly calls: { userKey: string; pageToken?: string }[] = [];

  constructor(private readonly memberships: Record<string, string[][]>) {}

  async listGroups(userKey: string, pageToken?: string): Promise<DirectoryGroupsPage> {
    this.calls.push({ userKey, pageToken });

    const pages = this.memberships[userKey] ?? [[]];
    const index = pageToken ? Number(pageToken) : 0;
    const page = pages[index] ?? [];

    return {
      groups: page.map((email) => ({ email })),
      nextPageToken: index + 1 < pages.length ? String(index + 1) : undefined,
    };
  }
}

let privateKey: jose.KeyLike;
let jwks: jose.JWTVerifyGetKey;

beforeAll(async () => {
  const pair = await jose.generateKeyPair('RS256');
  privateKey = pair.privateKey;
  const publicJwk = await jose.exportJWK(pair.publicKey);
  jwks = jose.createLocalJWKSet({ keys: [{ ...publicJwk, kid: 'google-test', alg: 'RS256' }] });
});

async function idToken(
  claims: Record<string, unknown> = {},
  audience = 'client-id'
): Promise<string> {
  return new jose.SignJWT({
    email: 'jane@example.com',
    email_verified: true,
    name: 'Jane Doe',
    ...claims,
  })
    .setProtectedHeader({ alg: 'RS256', kid: 'google-test' })
    .setIssuer('https://accounts.google.com')
    .setAudience(audience)
    .setSubject('google-sub-1')
    .setIssuedAt()
    .setExpirationTime('1h')
    .sign(privateKey);
}

function stubTokenEndpoint(token: Record<string, unknown>) {
  return stubFetch({ [`POST ${TOKEN_URL}`]: () => jsonResponse(token) });
}

function createConnector(
  overrides: Partial<GoogleConfig> = {},
  directory?: FakeDirectory,
  factoryCalls: string[] = []
): GoogleConnector {
  const config = googleConfigSchema.parse({
    clientID: 'client-id',
    clientSecret: 'test-secret',
    redirectURI: REDIRECT_URI,
    ...overrides,
  });

  return new GoogleConnector('google', config, {
    jwks,
    directoryClientFactory: directory
      ? (adminEmail) => {
          factoryCalls.push(adminEmail);
          return directory;
        }
      : undefined,
  });
}

const callback = { query: new URLSearchParams({ code: 'auth-code' }) };

describe('GoogleConnector', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('loginURL', () => {
    it('requests openid, profile and email by default', () => {
      const { url } = createConnector().loginURL(NO_SCOPES, REDIRECT_URI, 'state-1');
      const parsed = new URL(url);

      expect(`${parsed.origin}${parsed.pathname}`).toBe('https://accounts.google.com/o/oauth2/v2/auth');
      expect(parsed.searchParams.get('scope')).toBe('openid profile email');
      expect(parsed.searchParams.get('state')).toBe('state-1');
      expect(parsed.searchParams.has('hd')).toBe(false);
      expect(parsed.searchParams.has('access_type')).toBe(false);
    });

    it('asks for offline access with forced consent', () => {
      const { url } = createConnector().loginURL(OFFLINE_SCOPES, REDIRECT_URI, 'state-1');
      const parsed = new URL(url);

      expect(parsed.searchParams.get('access_type')).toBe('offline');
      expect(parsed.searchParams.get('prompt')).toBe('consent');
    });

    it('passes a single hosted domain as hd', () => {
      const { url } = createConnector({ hostedDomains: ['example.com'] }).loginURL(
        NO_SCOPES,
        REDIRECT_URI,
        'state-1'
      );

      expect(new URL(url).searchParams.get('hd')).toBe('example.com');
    });

    it('passes the wildcard hd for several hosted domains', () => {
      const { url } = createConnector({ hostedDomains: ['example.com', 'example.org'] }).loginURL(
        NO_SCOPES,
        REDIRECT_URI,
        'state-1'
      );

      expect(new URL(url).searchParams.get('hd')).toBe('*');
    });

    it('rejects a mismatched callback URL', () => {
      expect(() =>
        createConnector().loginURL(NO_SCOPES, 'https://other.example.com/cb', 'state-1')
      ).toThrow(ConfigurationError);
    });
  });

  describe('handleCallback', () => {
    it('builds the identity from a verified ID token', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken() });

      const identity = await createConnector().handleCallback(NO_SCOPES, undefined, callback);

      expect(identity).toEqual({
        userId: 'google-sub-1',
        username: 'Jane Doe',
        email: 'jane@example.com',
        emailVerified: true,
        groups: [],
      });
    });

    it('falls back to the email when there is no name claim', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken({ name: '' }) });

      const identity = await createConnector().handleCallback(NO_SCOPES, undefined, callback);

      expect(identity.username).toBe('jane@example.com');
    });

    it('fails without an id_token', async () => {
      stubTokenEndpoint({ access_token: 'g-access' });

      await expect(
        createConnector().handleCallback(NO_SCOPES, undefined, callback)
      ).rejects.toThrow(new UpstreamMalformedError('google: no id_token in token response'));
    });

    it('rejects an ID token issued to another client', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken({}, 'someone-else') });

      await expect(
        createConnector().handleCallback(NO_SCOPES, undefined, callback)
      ).rejects.toBeInstanceOf(UpstreamMalformedError);
    });

    it('enforces hosted domains', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken({ hd: 'other.com' }) });

      const promise = createConnector({ hostedDomains: ['example.com'] }).handleCallback(
        NO_SCOPES,
        undefined,
        callback
      );

      await expect(promise).rejects.toBeInstanceOf(PolicyViolationError);
      await expect(promise).rejects.toThrow('google: unexpected hd claim "other.com"');
    });

    it('accepts a user of an allowed hosted domain', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken({ hd: 'example.com' }) });

      const identity = await createConnector({ hostedDomains: ['example.com'] }).handleCallback(
        NO_SCOPES,
        undefined,
        callback
      );

      expect(identity.userId).toBe('google-sub-1');
    });

    it('returns the refresh token as connector data for offline access', async () => {
      stubTokenEndpoint({
        access_token: 'g-access',
        refresh_token: 'g-refresh',
        id_token: await idToken(),
      });

      const identity = await createConnector().handleCallback(OFFLINE_SCOPES, undefined, callback);

      expect(decodeConnectorData(identity.connectorData ?? new Uint8Array())).toEqual({
        refreshToken: 'g-refresh',
      });
    });
  });

  describe('groups', () => {
    const memberships: Record<string, string[][]> = {
      'jane@example.com': [['eng@example.com'], ['all@example.com']],
      'eng@example.com': [['all@example.com', 'platform@example.com']],
      'all@example.com': [['eng@example.com']],
      'platform@example.com': [[]],
    };

    it('lists direct groups across pages', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken() });
      const directory = new FakeDirectory(memberships);

      const identity = await createConnector(
        { domainToAdminEmail: { 'example.com': 'admin@example.com' } },
        directory
      ).handleCallback(GROUP_SCOPES, undefined, callback);

      expect(identity.groups).toEqual(['eng@example.com', 'all@example.com']);
      expect(directory.calls).toEqual([
        { userKey: 'jane@example.com', pageToken: undefined },
        { userKey: 'jane@example.com', pageToken: '1' },
      ]);
    });

    it('walks transitive membership once per group despite cycles', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken() });
      const directory = new FakeDirectory(memberships);

      const identity = await createConnector(
        {
          domainToAdminEmail: { 'example.com': 'admin@example.com' },
          fetchTransitiveGroupMembership: true,
        },
        directory
      ).handleCallback(GROUP_SCOPES, undefined, callback);

      expect(identity.groups).toEqual([
        'eng@example.com',
        'all@example.com',
        'platform@example.com',
      ]);
      expect(directory.calls.map((call) => call.userKey)).toEqual([
        'jane@example.com',
        'eng@example.com',
        'all@example.com',
        'platform@example.com',
        'jane@example.com',
      ]);
    });

    it('does not call the directory unless groups are needed', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken() });
      const directory = new FakeDirectory(memberships);

      const identity = await createConnector(
        { domainToAdminEmail: { 'example.com': 'admin@example.com' } },
        directory
      ).handleCallback(NO_SCOPES, undefined, callback);

      expect(identity.groups).toEqual([]);
      expect(directory.calls).toEqual([]);
    });

    it('applies the allow-list', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken() });

      const identity = await createConnector(
        {
          domainToAdminEmail: { 'example.com': 'admin@example.com' },
          fetchTransitiveGroupMembership: true,
          groups: ['platform@example.com'],
        },
        new FakeDirectory(memberships)
      ).handleCallback(NO_SCOPES, undefined, callback);

      expect(identity.groups).toEqual(['platform@example.com']);
    });

    it('rejects a user outside the allow-list', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken() });

      await expect(
        createConnector(
          {
            domainToAdminEmail: { 'example.com': 'admin@example.com' },
            groups: ['admins@example.com'],
          },
          new FakeDirectory(memberships)
        ).handleCallback(NO_SCOPES, undefined, callback)
      ).rejects.toThrow(new GroupPolicyViolationError('google', 'Jane Doe'));
    });

    it('falls back to the wildcard admin from the deprecated adminEmail', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken() });
      const factoryCalls: string[] = [];

      const identity = await createConnector(
        { adminEmail: 'admin@example.com' },
        new FakeDirectory(memberships),
        factoryCalls
      ).handleCallback(GROUP_SCOPES, undefined, callback);

      expect(factoryCalls).toEqual(['admin@example.com']);
      expect(identity.groups).toEqual(['eng@example.com', 'all@example.com']);
    });

    it('fails when no admin covers the user domain', async () => {
      stubTokenEndpoint({ access_token: 'g-access', id_token: await idToken() });

      await expect(
        createConnector(
          { domainToAdminEmail: { 'example.org': 'admin@example.org' } },
          new FakeDirectory(memberships)
        ).handleCallback(GROUP_SCOPES, undefined, callback)
      ).rejects.toThrow(
        new ConfigurationError(
          'google: no admin email configured for domain "example.com" and no "*" fallback'
        )
      );
    });

    it('requires domainToAdminEmail when a service account file is set', () => {
      expect(() => createConnector({ serviceAccountFilePath: '/tmp/sa.json' })).toThrow(
        ConfigurationError
      );
    });
  });

  describe('refresh', () => {
    function identityWith(connectorData?: Uint8Array): Identity {
      return {
        userId: 'google-sub-1',
        username: 'Jane Doe',
        email: 'jane@example.com',
        emailVerified: true,
        groups: [],
        connectorData,
      };
    }

    it('exchanges the stored refresh token and keeps it', async () => {
      const { requests } = stubTokenEndpoint({
        access_token: 'g-access-2',
        id_token: await idToken(),
      });

      const identity = await createConnector().refresh(
        OFFLINE_SCOPES,
        identityWith(encodeConnectorData({ refreshToken: 'g-refresh' }))
      );

      const body = new URLSearchParams(requests[0]?.body);
      expect(body.get('grant_type')).toBe('refresh_token');
      expect(body.get('refresh_token')).toBe('g-refresh');
      expect(decodeConnectorData(identity.connectorData ?? new Uint8Array())).toEqual({
        refreshToken: 'g-refresh',
      });
    });

    it('fails without connector data', async () => {
      await expect(createConnector().refresh(OFFLINE_SCOPES, identityWith())).rejects.toThrow(
        new ConfigurationError('google: identity has no connector data')
      );
    });
  });
});

describe('domainOf', () => {
  it('takes the text after the last @', () => {
    expect(domainOf('jane@example.com')).toBe('example.com');
    expect(domainOf('odd@name@example.org')).toBe('example.org');
  });

  it('uses the wildcard when there is no @', () => {
    expect(domainOf('nobody')).toBe('*');
  });
});
