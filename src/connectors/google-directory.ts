import { readFileSync } from 'node:fs';
import { z } from 'zod';
import * as jose from 'jose';
import { ConfigurationError } from '../errors/connector-error.js';
import {
  CONTENT_TYPE_FORM,
  CONTENT_TYPE_JSON,
  GOOGLE_DIRECTORY_SCOPE,
  GOOGLE_TOKEN_URL,
  JWT_BEARER_GRANT_TYPE,
} from '../config/constants.js';
import { getJSON, readJSON, send, tokenResponseSchema } from './oauth2-client.js';

export interface DirectoryGroup {
  email: string;
}

export interface DirectoryGroupsPage {
  groups: DirectoryGroup[];
  nextPageToken?: string;
}

/**
 * Read access to the groups of a directory user or group
 */
export interface DirectoryClient {
  /**
   * One page of the groups userKey (a user or group email) belongs to
   */
  listGroups(userKey: string, pageToken?: string, signal?: AbortSignal): Promise<DirectoryGroupsPage>;
}

export type DirectoryClientFactory = (adminEmail: string) => DirectoryClient;

const serviceAccountSchema = z.object({
  type: z.literal('service_account'),
  client_email: z.string(),
  private_key: z.string(),
  token_uri: z.string().url().default(GOOGLE_TOKEN_URL),
});

export type ServiceAccountCredentials = z.output<typeof serviceAccountSchema>;

const groupsPageSchema = z.object({
  groups: z.array(z.object({ email: z.string() })).nullish(),
  nextPageToken: z.string().nullish(),
});

// Refresh the access token this long before Google expires it
const TOKEN_EXPIRY_SKEW_MS = 60_000;

/**
 * Load service account credentials from a JSON key file
 */
export function loadServiceAccountCredentials(path: string): ServiceAccountCredentials {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`google: error reading credentials from file "${path}"`, err);
  }

  const result = serviceAccountSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`google: "${path}" is not a service account key file`, result.error);
  }

  return result.data;
}

/**
 * Admin SDK Directory API client authenticated with a service account
 * that impersonates a domain administrator (JWT bearer grant, RFC 7523)
 */
export class ServiceAccountDirectoryClient implements DirectoryClient {
  private accessToken?: { value: string; expiresAt: number };

  constructor(
    private readonly credentials: ServiceAccountCredentials,
    private readonly adminEmail: string,
    private readonly directoryURL: string
  ) {}

  async listGroups(
    userKey: string,
    pageToken?: string,
    signal?: AbortSignal
  ): Promise<DirectoryGroupsPage> {
    const url = new URL('/admin/directory/v1/groups', this.directoryURL);
    url.searchParams.set('userKey', userKey);
    if (pageToken) {
      url.searchParams.set('pageToken', pageToken);
    }

    const token = await this.token(signal);
    const { data } = await getJSON('google: list groups', url.toString(), token, groupsPageSchema, signal);

    return {
      groups: data.groups ?? [],
      nextPageToken: data.nextPageToken ?? undefined,
    };
  }

  private async token(signal?: AbortSignal): Promise<string> {
    if (this.accessToken && this.accessToken.expiresAt > Date.now()) {
      return this.accessToken.value;
    }

    const privateKey = await jose.importPKCS8(this.credentials.private_key, 'RS256');
    const assertion = await new jose.SignJWT({ scope: GOOGLE_DIRECTORY_SCOPE })
      .setProtectedHeader({ alg: 'RS256', typ: 'JWT' })
      .setIssuer(this.credentials.client_email)
      .setSubject(this.adminEmail)
      .setAudience(this.credentials.token_uri)
      .setIssuedAt()
      .setExpirationTime('1h')
      .sign(privateKey);

    const operation = 'google: service account token';
    const response = await send(operation, this.credentials.token_uri, {
      method: 'POST',
      headers: {
        'Content-Type': CONTENT_TYPE_FORM,
        Accept: CONTENT_TYPE_JSON,
      },
      body: new URLSearchParams({ grant_type: JWT_BEARER_GRANT_TYPE, assertion }).toString(),
      signal,
    });

    const token = await readJSON(operation, response, tokenResponseSchema);
    this.accessToken = {
      value: token.access_token,
      expiresAt: Date.now() + (token.expires_in ?? 3600) * 1000 - TOKEN_EXPIRY_SKEW_MS,
    };

    return token.access_token;
  }
}

/**
 * Directory clients built from one service account key file, one per
 * impersonated admin
 */
export function serviceAccountDirectoryFactory(
  credentialsPath: string,
  directoryURL: string
): DirectoryClientFactory {
  const credentials = loadServiceAccountCredentials(credentialsPath);
  return (adminEmail) => new ServiceAccountDirectoryClient(credentials, adminEmail, directoryURL);
}
