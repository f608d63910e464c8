/**
 * xferctl Runtime Host — Identity Provider Client
 *
 * Form-encoded POSTs to the OAuth2 token and introspection endpoints under
 * the configured auth base URL:
 *
 *   <authBaseUrl>/token             authorization_code, refresh_token grants
 *   <authBaseUrl>/token/introspect  token introspection
 *
 * Confidential clients authenticate with HTTP basic auth; public clients
 * send `client_id` in the form instead.
 *
 * Failures use the same transport and error mapping as ApiClient.
 * `expires_in` is converted to an absolute instant as soon as the response
 * arrives.
 */

import {
  NOOP_LOG_SINK,
  ProtocolError,
  parseScopeList,
  secureTlsProfile,
} from '@xferctl/kernel';
import type { IntrospectionResult, LogSink, TokenBundle } from '@xferctl/kernel';

import type { ClientConfig } from '../config/env.js';
import { execute } from '../http/execute.js';
import { NodeHttpsTransport } from '../http/transport.js';
import type { HttpTransport } from '../http/transport.js';
import type { TokenRefresher } from '../tokens/token-store.js';

export const DEFAULT_SCOPES: ReadonlyArray<string> = ['openid', 'profile', 'email'];

const IDP_TIMEOUT_MS = 30_000;

export interface IdentityProviderOptions {
  readonly transport?: HttpTransport | undefined;
  /** Clock used to turn `expires_in` into an absolute expiry. */
  readonly now?: (() => Date) | undefined;
  readonly log?: LogSink | undefined;
}

// ---------------------------------------------------------------------------
// Authorization URL
// ---------------------------------------------------------------------------

export interface AuthorizationUrlParams {
  readonly authBaseUrl: string;
  readonly clientId: string;
  readonly redirectUri: string;
  readonly scopes: ReadonlyArray<string>;
  readonly state: string;
}

export function buildAuthorizationUrl(params: AuthorizationUrlParams): string {
  const url = new URL(`${params.authBaseUrl}/authorize`);
  url.searchParams.set('client_id', params.clientId);
  url.searchParams.set('redirect_uri', params.redirectUri);
  url.searchParams.set('scope', params.scopes.join(' '));
  url.searchParams.set('state', params.state);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('access_type', 'offline');
  return url.href;
}

// ---------------------------------------------------------------------------
// Response shapes
// ---------------------------------------------------------------------------

interface TokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in: number;
  scope?: string;
  resource_server?: string;
}

function isTokenResponse(value: unknown): value is TokenResponse {
  if (value === null || typeof value !== 'object') return false;
  if (!('access_token' in value) || typeof value.access_token !== 'string' || value.access_token === '') {
    return false;
  }
  if (!('expires_in' in value) || typeof value.expires_in !== 'number') return false;
  if ('refresh_token' in value && typeof value.refresh_token !== 'string') return false;
  if ('scope' in value && typeof value.scope !== 'string') return false;
  if ('resource_server' in value && typeof value.resource_server !== 'string') return false;
  return true;
}

interface IntrospectionResponse {
  active: boolean;
  sub?: string | null;
  username?: string | null;
  email?: string | null;
  name?: string | null;
}

function isOptionalText(value: object, key: string): boolean {
  const field: unknown = Reflect.get(value, key);
  return field === undefined || field === null || typeof field === 'string';
}

function isIntrospectionResponse(value: unknown): value is IntrospectionResponse {
  if (value === null || typeof value !== 'object') return false;
  if (!('active' in value) || typeof value.active !== 'boolean') return false;
  return ['sub', 'username', 'email', 'name'].every((key) => isOptionalText(value, key));
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class IdentityProviderClient implements TokenRefresher {
  private readonly transport: HttpTransport;
  private readonly now: () => Date;
  private readonly log: LogSink;

  constructor(
    private readonly config: ClientConfig,
    options: IdentityProviderOptions = {},
  ) {
    this.transport = options.transport ?? new NodeHttpsTransport(secureTlsProfile());
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? NOOP_LOG_SINK;
  }

  /** Trade an authorization code for a bundle. */
  async exchangeCode(code: string, redirectUri: string, signal?: AbortSignal): Promise<TokenBundle> {
    const form = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: redirectUri,
    });
    return this.toBundle(await this.postForm('token', form, 'token exchange', signal, isTokenResponse), 'token exchange');
  }

  async refresh(refreshCredential: string, signal?: AbortSignal): Promise<TokenBundle> {
    const form = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: refreshCredential,
    });
    return this.toBundle(await this.postForm('token', form, 'token refresh', signal, isTokenResponse), 'token refresh');
  }

  async introspect(accessCredential: string, signal?: AbortSignal): Promise<IntrospectionResult> {
    const form = new URLSearchParams({ token: accessCredential });
    const body = await this.postForm('token/introspect', form, 'token introspection', signal, isIntrospectionResponse);
    return {
      active: body.active,
      ...(typeof body.sub === 'string' ? { subject: body.sub } : {}),
      ...(typeof body.username === 'string' ? { username: body.username } : {}),
      ...(typeof body.email === 'string' ? { email: body.email } : {}),
      ...(typeof body.name === 'string' ? { name: body.name } : {}),
    };
  }

  close(): void {
    this.transport.close();
  }

  // -------------------------------------------------------------------------

  private toBundle(response: TokenResponse, what: string): TokenBundle {
    const expiresAt = new Date(this.now().getTime() + response.expires_in * 1000);
    if (!Number.isFinite(expiresAt.getTime())) {
      throw new ProtocolError(`Cannot decode ${what} response: expires_in ${response.expires_in} is out of range.`);
    }
    return {
      accessCredential: response.access_token,
      ...(response.refresh_token !== undefined && response.refresh_token !== ''
        ? { refreshCredential: response.refresh_token }
        : {}),
      expiresAt,
      scopes: parseScopeList(response.scope ?? ''),
      resourceServer: response.resource_server ?? '',
    };
  }

  private async postForm<T>(
    path: string,
    form: URLSearchParams,
    what: string,
    signal: AbortSignal | undefined,
    guard: (value: unknown) => value is T,
  ): Promise<T> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    };
    if (this.config.clientSecret !== undefined) {
      const basic = Buffer.from(
        `${encodeURIComponent(this.config.clientId)}:${encodeURIComponent(this.config.clientSecret)}`,
      ).toString('base64');
      headers['Authorization'] = `Basic ${basic}`;
    } else {
      form.set('client_id', this.config.clientId);
    }

    const url = new URL(`${this.config.authBaseUrl}/${path}`);
    this.log.debug(`POST ${url.href} (${what})`);
    const response = await execute(
      this.transport,
      { method: 'POST', url, headers, body: form.toString() },
      { context: what, timeoutMs: IDP_TIMEOUT_MS, signal },
    );

    let text: string;
    try {
      text = await response.text();
    } finally {
      response.release();
    }
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (err) {
      throw new ProtocolError(`Cannot decode ${what} response: body is not valid JSON.`, { cause: err });
    }
    if (!guard(value)) {
      throw new ProtocolError(`Cannot decode ${what} response: unexpected shape.`);
    }
    return value;
  }
}
