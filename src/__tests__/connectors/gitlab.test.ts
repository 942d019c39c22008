import { describe, it, expect, afterEach, vi } from 'vitest';
import { GitLabConnector, gitlabConfigSchema, type GitLabConfig } from '../../connectors/gitlab.js';
import { decodeConnectorData, encodeConnectorData } from '../../connectors/types.js';
import type { ConnectorScopes, Identity } from '../../types/identity.js';
import {
  ConfigurationError,
  GroupPolicyViolationError,
  UpstreamMalformedError,
  UpstreamRejectedError,
  UpstreamUnreachableError,
} from '../../errors/connector-error.js';
import { stubFetch, jsonResponse, type RouteHandler } from '../helpers/fake-fetch.js';

const BASE = 'https://gitlab.example.com';
const REDIRECT_URI = 'https://broker.example.com/callback/gitlab';

const NO_SCOPES: ConnectorScopes = { offlineAccess: false, groups: false };
const GROUP_SCOPES: ConnectorScopes = { offlineAccess: false, groups: true };
const OFFLINE_SCOPES: ConnectorScopes = { offlineAccess: true, groups: false };

function createConnector(overrides: Partial<GitLabConfig> = {}): GitLabConnector {
  const config = gitlabConfigSchema.parse({
    baseURL: `${BASE}/`,
    clientID: 'client-id',
    clientSecret: 'test-secret',
    redirectURI: REDIRECT_URI,
    ...overrides,
  });
  return new GitLabConnector('gitlab', config);
}

function callback(query: Record<string, string>, signal?: AbortSignal) {
  return { query: new URLSearchParams(query), signal };
}

const tokenRoute: RouteHandler = () =>
  jsonResponse({ access_token: 'gl-access', refresh_token: 'gl-refresh', token_type: 'Bearer' });

const userRoute: RouteHandler = () =>
  jsonResponse({ id: 42, name: 'Jane Doe', username: 'jane', email: 'jane@example.com' });

// Three visible groups over two pages; jane belongs to 1 and 3
const membershipRoutes: Record<string, RouteHandler> = {
  [`GET ${BASE}/api/v4/groups`]: ({ url }) => {
    if (url.searchParams.get('page') === '2') {
      return jsonResponse([{ id: 3, full_path: 'security' }], 200, {
        Link: `<${BASE}/api/v4/groups?page=1>; rel="prev", <${BASE}/api/v4/groups?page=2>; rel="last"`,
      });
    }
    return jsonResponse(
      [
        { id: 1, full_path: 'platform' },
        { id: 2, full_path: 'platform/infra' },
      ],
      200,
      {
        Link: `<${BASE}/api/v4/groups?page=2>; rel="next", <${BASE}/api/v4/groups?page=2>; rel="last"`,
      }
    );
  },
  [`GET ${BASE}/api/v4/groups/1/members/all/42`]: () => jsonResponse({ access_level: 30 }),
  [`GET ${BASE}/api/v4/groups/2/members/all/42`]: () => jsonResponse({ message: '404 Not found' }, 404),
  [`GET ${BASE}/api/v4/groups/3/members/all/42`]: () => jsonResponse({ access_level: 50 }),
};

describe('GitLabConnector', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('loginURL', () => {
    it('requests read_user only when no groups are needed', () => {
      const { url, connectorData } = createConnector().loginURL(NO_SCOPES, REDIRECT_URI, 'state-1');
      const parsed = new URL(url);

      expect(`${parsed.origin}${parsed.pathname}`).toBe(`${BASE}/oauth/authorize`);
      expect(parsed.searchParams.get('client_id')).toBe('client-id');
      expect(parsed.searchParams.get('redirect_uri')).toBe(REDIRECT_URI);
      expect(parsed.searchParams.get('response_type')).toBe('code');
      expect(parsed.searchParams.get('scope')).toBe('read_user');
      expect(parsed.searchParams.get('state')).toBe('state-1');
      expect(connectorData).toBeUndefined();
    });

    it('adds openid and read_api when the client asks for groups', () => {
      const { url } = createConnector().loginURL(GROUP_SCOPES, REDIRECT_URI, 'state-1');

      expect(new URL(url).searchParams.get('scope')).toBe('read_user openid read_api');
    });

    it('adds openid and read_api when an allow-list is configured', () => {
      const { url } = createConnector({ groups: ['platform'] }).loginURL(
        NO_SCOPES,
        REDIRECT_URI,
        'state-1'
      );

      expect(new URL(url).searchParams.get('scope')).toBe('read_user openid read_api');
    });

    it('rejects a callback URL that differs from the redirect URI', () => {
      expect(() =>
        createConnector().loginURL(NO_SCOPES, 'https://evil.example.com/callback', 'state-1')
      ).toThrow(
        new ConfigurationError(
          `gitlab: callback URL "https://evil.example.com/callback" does not match configured redirect URI "${REDIRECT_URI}"`
        )
      );
    });
  });

  describe('handleCallback', () => {
    it('surfaces an upstream error parameter', async () => {
      const promise = createConnector().handleCallback(
        NO_SCOPES,
        undefined,
        callback({ error: 'access_denied', error_description: 'The user denied access' })
      );

      await expect(promise).rejects.toBeInstanceOf(UpstreamRejectedError);
      await expect(promise).rejects.toThrow('access_denied: The user denied access');
    });

    it('fails when the code is missing', async () => {
      await expect(
        createConnector().handleCallback(NO_SCOPES, undefined, callback({ state: 'x' }))
      ).rejects.toBeInstanceOf(UpstreamMalformedError);
    });

    it('builds the identity from the user endpoint', async () => {
      const { requests } = stubFetch({
        [`POST ${BASE}/oauth/token`]: tokenRoute,
        [`GET ${BASE}/api/v4/user`]: userRoute,
      });

      const identity = await createConnector().handleCallback(
        NO_SCOPES,
        undefined,
        callback({ code: 'auth-code' })
      );

      expect(identity).toEqual({
        userId: '42',
        username: 'Jane Doe',
        preferredUsername: 'jane',
        email: 'jane@example.com',
        emailVerified: true,
        groups: [],
      });
      expect(identity.connectorData).toBeUndefined();

      const tokenRequest = new URLSearchParams(requests[0]?.body);
      expect(tokenRequest.get('grant_type')).toBe('authorization_code');
      expect(tokenRequest.get('code')).toBe('auth-code');
      expect(tokenRequest.get('client_secret')).toBe('test-secret');
      expect(requests[1]?.headers.get('Authorization')).toBe('Bearer gl-access');
      expect(requests).toHaveLength(2);
    });

    it('falls back to the email when the user has no display name', async () => {
      stubFetch({
        [`POST ${BASE}/oauth/token`]: tokenRoute,
        [`GET ${BASE}/api/v4/user`]: () =>
          jsonResponse({ id: 42, name: '', username: 'jane', email: 'jane@example.com' }),
      });

      const identity = await createConnector().handleCallback(
        NO_SCOPES,
        undefined,
        callback({ code: 'auth-code' })
      );

      expect(identity.username).toBe('jane@example.com');
    });

    it('uses the login handle as user id when configured', async () => {
      stubFetch({
        [`POST ${BASE}/oauth/token`]: tokenRoute,
        [`GET ${BASE}/api/v4/user`]: userRoute,
      });

      const identity = await createConnector({ useLoginAsID: true }).handleCallback(
        NO_SCOPES,
        undefined,
        callback({ code: 'auth-code' })
      );

      expect(identity.userId).toBe('jane');
    });

    it('returns connector data for offline access', async () => {
      stubFetch({
        [`POST ${BASE}/oauth/token`]: tokenRoute,
        [`GET ${BASE}/api/v4/user`]: userRoute,
      });

      const identity = await createConnector().handleCallback(
        OFFLINE_SCOPES,
        undefined,
        callback({ code: 'auth-code' })
      );

      expect(identity.connectorData).toBeDefined();
      expect(decodeConnectorData(identity.connectorData ?? new Uint8Array())).toEqual({
        accessToken: 'gl-access',
        refreshToken: 'gl-refresh',
      });
    });

    it('maps a token endpoint error body to an upstream rejection', async () => {
      stubFetch({
        [`POST ${BASE}/oauth/token`]: () =>
          jsonResponse({ error: 'invalid_grant', error_description: 'bad code' }, 400),
      });

      const promise = createConnector().handleCallback(
        NO_SCOPES,
        undefined,
        callback({ code: 'auth-code' })
      );

      await expect(promise).rejects.toBeInstanceOf(UpstreamRejectedError);
      await expect(promise).rejects.toThrow('invalid_grant: bad code');
    });

    it('reports an unexpected user endpoint status', async () => {
      stubFetch({
        [`POST ${BASE}/oauth/token`]: tokenRoute,
        [`GET ${BASE}/api/v4/user`]: () => new Response('boom', { status: 500 }),
      });

      const promise = createConnector().handleCallback(
        NO_SCOPES,
        undefined,
        callback({ code: 'auth-code' })
      );

      await expect(promise).rejects.toBeInstanceOf(UpstreamMalformedError);
      await expect(promise).rejects.toThrow('gitlab: get user: unexpected status 500: boom');
    });

    it('reports an aborted request as unreachable', async () => {
      stubFetch({ [`POST ${BASE}/oauth/token`]: tokenRoute });
      const controller = new AbortController();
      controller.abort();

      await expect(
        createConnector().handleCallback(
          NO_SCOPES,
          undefined,
          callback({ code: 'auth-code' }, controller.signal)
        )
      ).rejects.toBeInstanceOf(UpstreamUnreachableError);
    });
  });

  describe('groups', () => {
    it('resolves memberships across every page of groups', async () => {
      const { requests } = stubFetch({
        [`POST ${BASE}/oauth/token`]: tokenRoute,
        [`GET ${BASE}/api/v4/user`]: userRoute,
        ...membershipRoutes,
      });

      const identity = await createConnector().handleCallback(
        GROUP_SCOPES,
        undefined,
        callback({ code: 'auth-code' })
      );

      expect(identity.groups).toEqual(['platform', 'security']);
      expect(requests.map((r) => r.url.href)).toEqual([
        `${BASE}/oauth/token`,
        `${BASE}/api/v4/user`,
        `${BASE}/api/v4/groups`,
        `${BASE}/api/v4/groups?page=2`,
        `${BASE}/api/v4/groups/1/members/all/42`,
        `${BASE}/api/v4/groups/2/members/all/42`,
        `${BASE}/api/v4/groups/3/members/all/42`,
      ]);
    });

    it('adds role annotations when getGroupsPermission is set', async () => {
      stubFetch({
        [`POST ${BASE}/oauth/token`]: tokenRoute,
        [`GET ${BASE}/api/v4/user`]: userRoute,
        ...membershipRoutes,
      });

      const identity = await createConnector({ getGroupsPermission: true }).handleCallback(
        GROUP_SCOPES,
        undefined,
        callback({ code: 'auth-code' })
      );

      expect(identity.groups).toEqual([
        'platform',
        'platform:developer',
        'security',
        'security:owner',
      ]);
    });

    it('filters resolved groups through the allow-list', async () => {
      stubFetch({
        [`POST ${BASE}/oauth/token`]: tokenRoute,
        [`GET ${BASE}/api/v4/user`]: userRoute,
        ...membershipRoutes,
      });

      const identity = await createConnector({ groups: ['security', 'finance'] }).handleCallback(
        NO_SCOPES,
        undefined,
        callback({ code: 'auth-code' })
      );

      expect(identity.groups).toEqual(['security']);
    });

    it('rejects a user outside the allow-list without naming the groups', async () => {
      stubFetch({
        [`POST ${BASE}/oauth/token`]: tokenRoute,
        [`GET ${BASE}/api/v4/user`]: userRoute,
        ...membershipRoutes,
      });

      const promise = createConnector({ groups: ['finance'] }).handleCallback(
        NO_SCOPES,
        undefined,
        callback({ code: 'auth-code' })
      );

      await expect(promise).rejects.toBeInstanceOf(GroupPolicyViolationError);
      await expect(promise).rejects.toThrow(
        new GroupPolicyViolationError('gitlab', 'jane')
      );
    });

    it('reads groups and roles from userinfo with the userinfo strategy', async () => {
      const { requests } = stubFetch({
        [`POST ${BASE}/oauth/token`]: tokenRoute,
        [`GET ${BASE}/api/v4/user`]: userRoute,
        [`GET ${BASE}/oauth/userinfo`]: () =>
          jsonResponse({
            sub: '42',
            groups: ['platform', 'security'],
            'https://gitlab.org/claims/groups/owner': ['security'],
            'https://gitlab.org/claims/groups/developer': ['platform'],
          }),
      });

      const identity = await createConnector({
        groupsStrategy: 'userinfo',
        getGroupsPermission: true,
      }).handleCallback(GROUP_SCOPES, undefined, callback({ code: 'auth-code' }));

      expect(identity.groups).toEqual([
        'platform',
        'security',
        'platform:developer',
        'security:owner',
      ]);
      expect(requests.some((r) => r.url.pathname.startsWith('/api/v4/groups'))).toBe(false);
    });
  });

  describe('refresh', () => {
    function identityWith(data: unknown): Identity {
      return {
        userId: '42',
        username: 'Jane Doe',
        email: 'jane@example.com',
        emailVerified: true,
        groups: [],
        connectorData: encodeConnectorData(data),
      };
    }

    it('exchanges the refresh token and keeps it when none is returned', async () => {
      const { requests } = stubFetch({
        [`POST ${BASE}/oauth/token`]: () => jsonResponse({ access_token: 'gl-access-2' }),
        [`GET ${BASE}/api/v4/user`]: userRoute,
      });

      const identity = await createConnector().refresh(
        OFFLINE_SCOPES,
        identityWith({ accessToken: 'gl-access', refreshToken: 'gl-refresh' })
      );

      const tokenRequest = new URLSearchParams(requests[0]?.body);
      expect(tokenRequest.get('grant_type')).toBe('refresh_token');
      expect(tokenRequest.get('refresh_token')).toBe('gl-refresh');
      expect(decodeConnectorData(identity.connectorData ?? new Uint8Array())).toEqual({
        accessToken: 'gl-access-2',
        refreshToken: 'gl-refresh',
      });
    });

    it('reuses the access token when there is no refresh token', async () => {
      const { requests } = stubFetch({ [`GET ${BASE}/api/v4/user`]: userRoute });

      const identity = await createConnector().refresh(
        NO_SCOPES,
        identityWith({ accessToken: 'gl-access' })
      );

      expect(identity.userId).toBe('42');
      expect(requests).toHaveLength(1);
      expect(requests[0]?.headers.get('Authorization')).toBe('Bearer gl-access');
    });

    it('fails without any token', async () => {
      await expect(createConnector().refresh(NO_SCOPES, identityWith({}))).rejects.toThrow(
        new ConfigurationError('gitlab: no refresh or access token found')
      );
    });

    it('fails without connector data', async () => {
      const identity = { ...identityWith({}), connectorData: undefined };

      await expect(createConnector().refresh(NO_SCOPES, identity)).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });
  });
});
