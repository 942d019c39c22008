import { z } from 'zod';
import {
  UpstreamMalformedError,
  UpstreamRejectedError,
  UpstreamUnreachableError,
} from '../errors/connector-error.js';
import { CONTENT_TYPE_FORM, CONTENT_TYPE_JSON } from '../config/constants.js';

/**
 * Token endpoint response (RFC 6749 Section 5.1)
 */
export const tokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string().optional(),
  refresh_token: z.string().optional(),
  expires_in: z.number().optional(),
  id_token: z.string().optional(),
  scope: z.string().optional(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export interface OAuth2ClientConfig {
  /** Prefix for error messages, usually the connector type */
  label: string;
  clientID: string;
  clientSecret: string;
  redirectURI: string;
  scopes: string[];
  authURL: string;
  tokenURL: string;
}

/**
 * Issue a request upstream. Network failures and aborts surface as
 * UpstreamUnreachableError.
 */
export async function send(
  operation: string,
  url: string,
  init: RequestInit = {}
): Promise<Response> {
  try {
    return await fetch(url, init);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new UpstreamUnreachableError(`${operation}: ${reason}`, err);
  }
}

/**
 * Read a 200 response body as JSON and validate it
 */
export async function readJSON<T>(
  operation: string,
  response: Response,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const body = await readBody(operation, response);

  if (response.status !== 200) {
    throw new UpstreamMalformedError(`${operation}: unexpected status ${response.status}: ${body}`, {
      status: response.status,
      body,
    });
  }

  return parseJSON(operation, body, schema);
}

/**
 * GET a JSON document with a bearer token
 */
export async function getJSON<T>(
  operation: string,
  url: string,
  accessToken: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  signal?: AbortSignal
): Promise<{ data: T; response: Response }> {
  const response = await send(operation, url, {
    headers: {
      Authorization: `Bearer ${accessToken}`,
      Accept: CONTENT_TYPE_JSON,
    },
    signal,
  });

  const data = await readJSON(operation, response, schema);
  return { data, response };
}

export function parseJSON<T>(
  operation: string,
  body: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (err) {
    throw new UpstreamMalformedError(`${operation}: failed to decode response: ${body}`, {
      body,
      cause: err,
    });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new UpstreamMalformedError(
      `${operation}: unexpected response: ${result.error.issues.map((i) => i.message).join(', ')}`,
      { body, cause: result.error }
    );
  }

  return result.data;
}

async function readBody(operation: string, response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new UpstreamUnreachableError(`${operation}: reading response: ${reason}`, err);
  }
}

/**
 * Authorization code grant against a single upstream provider
 */
export class OAuth2Client {
  constructor(private readonly config: OAuth2ClientConfig) {}

  /**
   * Build the authorization request URL
   */
  authCodeURL(state: string, extra: Record<string, string> = {}): string {
    const url = new URL(this.config.authURL);
    url.searchParams.set('client_id', this.config.clientID);
    url.searchParams.set('redirect_uri', this.config.redirectURI);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('scope', this.config.scopes.join(' '));
    url.searchParams.set('state', state);

    for (const [key, value] of Object.entries(extra)) {
      url.searchParams.set(key, value);
    }

    return url.toString();
  }

  /**
   * Exchange an authorization code for tokens
   */
  async exchange(code: string, signal?: AbortSignal): Promise<TokenResponse> {
    return this.requestToken(
      `${this.config.label}: exchange code`,
      {
        grant_type: 'authorization_code',
        code,
        redirect_uri: this.config.redirectURI,
      },
      signal
    );
  }

  /**
   * Exchange a refresh token for a new token set
   */
  async refresh(refreshToken: string, signal?: AbortSignal): Promise<TokenResponse> {
    return this.requestToken(
      `${this.config.label}: refresh token`,
      {
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
      },
      signal
    );
  }

  private async requestToken(
    operation: string,
    params: Record<string, string>,
    signal?: AbortSignal
  ): Promise<TokenResponse> {
    const body = new URLSearchParams({
      ...params,
      client_id: this.config.clientID,
      client_secret: this.config.clientSecret,
    });

    const response = await send(operation, this.config.tokenURL, {
      method: 'POST',
      headers: {
        'Content-Type': CONTENT_TYPE_FORM,
        Accept: CONTENT_TYPE_JSON,
      },
      body: body.toString(),
      signal,
    });

    if (response.status >= 400 && response.status < 500) {
      const text = await readBody(operation, response);
      const parsed = safeParseTokenError(text);
      if (parsed) {
        throw new UpstreamRejectedError(parsed.error, parsed.error_description);
      }
      throw new UpstreamMalformedError(`${operation}: unexpected status ${response.status}: ${text}`, {
        status: response.status,
        body: text,
      });
    }

    return readJSON(operation, response, tokenResponseSchema);
  }
}

function safeParseTokenError(body: string): z.infer<typeof tokenErrorSchema> | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return undefined;
  }

  const result = tokenErrorSchema.safeParse(raw);
  return result.success ? result.data : undefined;
}
