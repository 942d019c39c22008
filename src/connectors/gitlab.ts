import { z } from 'zod';
import type { ConnectorScopes, Identity } from '../types/identity.js';
import type { Logger } from '../utils/logger.js';
import { noopLogger } from '../utils/logger.js';
import {
  ConfigurationError,
  UpstreamMalformedError,
  UpstreamRejectedError,
} from '../errors/connector-error.js';
import { CONNECTOR_TYPE_GITLAB, CONTENT_TYPE_JSON, GITLAB_DEFAULT_BASE_URL } from '../config/constants.js';
import {
  type CallbackRequest,
  type Connector,
  type ConnectorOptions,
  type LoginURLResult,
  decodeConnectorData,
  encodeConnectorData,
} from './types.js';
import { OAuth2Client, type TokenResponse, getJSON, readJSON, send } from './oauth2-client.js';
import { nextPageURL } from './pagination.js';
import { applyGroupPolicy } from './groups.js';

// read operations of the /api/v4/user endpoint
const SCOPE_READ_USER = 'read_user';
// groups claim of /oauth/userinfo
const SCOPE_OPENID = 'openid';
// read operations of the /api/v4/groups endpoint
const SCOPE_READ_API = 'read_api';

/**
 * Numeric GitLab access levels and the role suffix they map to
 */
export const GITLAB_ACCESS_ROLES: ReadonlyMap<number, string> = new Map([
  [10, 'guest'],
  [20, 'reporter'],
  [30, 'developer'],
  [40, 'maintainer'],
  [50, 'owner'],
  [60, 'admin'],
]);

// Role claims of the userinfo endpoint, highest first
const USERINFO_ROLE_CLAIMS = [
  ['https://gitlab.org/claims/groups/owner', 'owner'],
  ['https://gitlab.org/claims/groups/maintainer', 'maintainer'],
  ['https://gitlab.org/claims/groups/developer', 'developer'],
] as const;

export const gitlabConfigSchema = z.object({
  baseURL: z
    .string()
    .url()
    .default(GITLAB_DEFAULT_BASE_URL)
    .transform((url) => url.replace(/\/+$/, '')),
  clientID: z.string().min(1),
  clientSecret: z.string().min(1),
  redirectURI: z.string().url(),
  groups: z.array(z.string()).default([]),
  /** Use the login handle instead of the numeric id as userId */
  useLoginAsID: z.boolean().default(false),
  /** Add "group:role" entries next to each group */
  getGroupsPermission: z.boolean().default(false),
  /**
   * membership lists every visible group and checks each one, costing one
   * request per group; userinfo reads the groups claim in one request
   */
  groupsStrategy: z.enum(['membership', 'userinfo']).default('membership'),
});

export type GitLabConfig = z.input<typeof gitlabConfigSchema>;
export type GitLabSettings = z.output<typeof gitlabConfigSchema>;

const gitlabUserSchema = z.object({
  id: z.number(),
  name: z.string().nullish(),
  username: z.string(),
  email: z.string().nullish(),
  state: z.string().nullish(),
});

type GitLabUser = z.infer<typeof gitlabUserSchema>;

const gitlabGroupSchema = z.object({
  id: z.number(),
  name: z.string().optional(),
  path: z.string().optional(),
  full_name: z.string().optional(),
  full_path: z.string(),
});

type GitLabGroup = z.infer<typeof gitlabGroupSchema>;

const membershipSchema = z.object({
  access_level: z.unknown(),
});

const userInfoSchema = z.object({
  groups: z.array(z.string()).nullish(),
  'https://gitlab.org/claims/groups/owner': z.array(z.string()).nullish(),
  'https://gitlab.org/claims/groups/maintainer': z.array(z.string()).nullish(),
  'https://gitlab.org/claims/groups/developer': z.array(z.string()).nullish(),
});

type UserInfo = z.infer<typeof userInfoSchema>;

const connectorDataSchema = z.object({
  accessToken: z.string().default(''),
  refreshToken: z.string().default(''),
});

/**
 * Logs users in through GitLab's OAuth2 provider
 */
export class GitLabConnector implements Connector {
  readonly type = CONNECTOR_TYPE_GITLAB;
  private readonly logger: Logger;

  constructor(
    readonly id: string,
    private readonly config: GitLabSettings,
    options: ConnectorOptions = {}
  ) {
    this.logger = (options.logger ?? noopLogger).child({ connector: { type: this.type, id } });
  }

  loginURL(scopes: ConnectorScopes, callbackURL: string, state: string): LoginURLResult {
    if (callbackURL !== this.config.redirectURI) {
      throw new ConfigurationError(
        `gitlab: callback URL "${callbackURL}" does not match configured redirect URI "${this.config.redirectURI}"`
      );
    }

    return { url: this.oauth2Client(scopes).authCodeURL(state) };
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
      throw new UpstreamMalformedError('gitlab: callback is missing the code parameter');
    }

    const token = await this.oauth2Client(scopes).exchange(code, request.signal);
    return this.identity(scopes, token, request.signal);
  }

  async refresh(scopes: ConnectorScopes, identity: Identity, signal?: AbortSignal): Promise<Identity> {
    const data = this.parseConnectorData(identity.connectorData);

    if (data.refreshToken) {
      const token = await this.oauth2Client(scopes).refresh(data.refreshToken, signal);
      // GitLab may omit the refresh token when it is unchanged
      return this.identity(
        scopes,
        { ...token, refresh_token: token.refresh_token ?? data.refreshToken },
        signal
      );
    }

    if (data.accessToken) {
      return this.identity(scopes, { access_token: data.accessToken }, signal);
    }

    throw new ConfigurationError('gitlab: no refresh or access token found');
  }

  private oauth2Client(scopes: ConnectorScopes): OAuth2Client {
    return new OAuth2Client({
      label: this.type,
      clientID: this.config.clientID,
      clientSecret: this.config.clientSecret,
      redirectURI: this.config.redirectURI,
      scopes: this.groupsRequired(scopes)
        ? [SCOPE_READ_USER, SCOPE_OPENID, SCOPE_READ_API]
        : [SCOPE_READ_USER],
      authURL: `${this.config.baseURL}/oauth/authorize`,
      tokenURL: `${this.config.baseURL}/oauth/token`,
    });
  }

  private groupsRequired(scopes: ConnectorScopes): boolean {
    return this.config.groups.length > 0 || scopes.groups;
  }

  private async identity(
    scopes: ConnectorScopes,
    token: TokenResponse,
    signal?: AbortSignal
  ): Promise<Identity> {
    const user = await this.user(token.access_token, signal);
    const email = user.email ?? '';

    let groups: string[] = [];
    if (this.groupsRequired(scopes)) {
      const resolved =
        this.config.groupsStrategy === 'userinfo'
          ? await this.userInfoGroups(token.access_token, signal)
          : await this.membershipGroups(token.access_token, user.id, signal);

      groups = applyGroupPolicy(this.type, user.username, resolved, this.config.groups);
    }

    const identity: Identity = {
      userId: this.config.useLoginAsID ? user.username : String(user.id),
      username: user.name || email,
      preferredUsername: user.username,
      email,
      emailVerified: true,
      groups,
    };

    if (scopes.offlineAccess) {
      identity.connectorData = encodeConnectorData({
        accessToken: token.access_token,
        refreshToken: token.refresh_token ?? '',
      });
    }

    return identity;
  }

  private async user(accessToken: string, signal?: AbortSignal): Promise<GitLabUser> {
    const { data } = await getJSON(
      'gitlab: get user',
      `${this.config.baseURL}/api/v4/user`,
      accessToken,
      gitlabUserSchema,
      signal
    );
    return data;
  }

  /**
   * List every group visible to the token, then keep the ones the user
   * belongs to
   */
  private async membershipGroups(
    accessToken: string,
    userId: number,
    signal?: AbortSignal
  ): Promise<string[]> {
    const candidates = await this.listGroups(accessToken, signal);
    const groups: string[] = [];

    for (const group of candidates) {
      const accessLevel = await this.accessLevel(accessToken, group.id, userId, signal);
      if (accessLevel === undefined) {
        continue;
      }

      groups.push(group.full_path);

      if (!this.config.getGroupsPermission) {
        continue;
      }

      const role = GITLAB_ACCESS_ROLES.get(accessLevel);
      if (role) {
        groups.push(`${group.full_path}:${role}`);
      }
    }

    this.logger.debug('resolved gitlab groups', {
      candidates: candidates.length,
      member: groups.length,
    });

    return groups;
  }

  private async listGroups(accessToken: string, signal?: AbortSignal): Promise<GitLabGroup[]> {
    const groups: GitLabGroup[] = [];
    const visited = new Set<string>();
    let url: string | undefined = `${this.config.baseURL}/api/v4/groups`;

    while (url !== undefined && !visited.has(url)) {
      visited.add(url);

      const { data, response } = await getJSON(
        'gitlab: list groups',
        url,
        accessToken,
        z.array(gitlabGroupSchema),
        signal
      );
      groups.push(...data);

      url = nextPageURL(url, response.headers.get('link'));
    }

    return groups;
  }

  /**
   * Access level of the user in a group, undefined when not a member
   */
  private async accessLevel(
    accessToken: string,
    groupId: number,
    userId: number,
    signal?: AbortSignal
  ): Promise<number | undefined> {
    const operation = 'gitlab: get group membership';
    const response = await send(
      operation,
      `${this.config.baseURL}/api/v4/groups/${groupId}/members/all/${userId}`,
      {
        headers: {
          Authorization: `Bearer ${accessToken}`,
          Accept: CONTENT_TYPE_JSON,
        },
        signal,
      }
    );

    if (response.status !== 200) {
      await response.body?.cancel();
      return undefined;
    }

    const membership = await readJSON(operation, response, membershipSchema);
    return typeof membership.access_level === 'number' ? membership.access_level : undefined;
  }

  private async userInfoGroups(accessToken: string, signal?: AbortSignal): Promise<string[]> {
    const { data } = await getJSON(
      'gitlab: get userinfo',
      `${this.config.baseURL}/oauth/userinfo`,
      accessToken,
      userInfoSchema,
      signal
    );

    const groups = [...(data.groups ?? [])];
    if (!this.config.getGroupsPermission) {
      return groups;
    }

    return [...groups, ...annotateRoles(data, groups)];
  }

  private parseConnectorData(raw: Uint8Array | undefined): z.infer<typeof connectorDataSchema> {
    if (!raw || raw.length === 0) {
      throw new ConfigurationError('gitlab: identity has no connector data');
    }

    let decoded: unknown;
    try {
      decoded = decodeConnectorData(raw);
    } catch (err) {
      throw new ConfigurationError('gitlab: unmarshal connector data', err);
    }

    const result = connectorDataSchema.safeParse(decoded);
    if (!result.success) {
      throw new ConfigurationError('gitlab: unmarshal connector data', result.error);
    }

    return result.data;
  }
}

/**
 * "group:role" for each group listed in a role claim, highest role only
 */
function annotateRoles(info: UserInfo, groups: readonly string[]): string[] {
  const annotated: string[] = [];

  for (const group of groups) {
    const match = USERINFO_ROLE_CLAIMS.find(([claim]) => info[claim]?.includes(group));
    if (match) {
      annotated.push(`${group}:${match[1]}`);
    }
  }

  return annotated;
}
