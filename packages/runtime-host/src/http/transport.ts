/**
 * xferctl Runtime Host — HTTPS Transport
 *
 * HttpTransport is the seam between request composition (ApiClient,
 * IdentityProviderClient) and the network. NodeHttpsTransport is the only
 * production implementation: a keep-alive `node:https` Agent carrying the
 * validated TLS profile. Tests inject an in-process fake.
 *
 * Pool limits: 100 sockets in total, 10 per host, 10 idle per host, and
 * idle sockets are closed after 90 seconds.
 */

import { Agent, request as httpsRequest } from 'node:https';
import type { AgentOptions } from 'node:https';
import type { IncomingHttpHeaders, IncomingMessage } from 'node:http';
import type { SecureVersion } from 'node:tls';

import { InsecureConfigurationError, TlsVersion } from '@xferctl/kernel';
import type { TlsProfile } from '@xferctl/kernel';

// ---------------------------------------------------------------------------
// Transport contract
// ---------------------------------------------------------------------------

export interface HttpRequest {
  readonly method: string;
  readonly url: URL;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string | undefined;
  readonly signal?: AbortSignal | undefined;
}

/**
 * A response whose body has not been read yet. Exactly one of text() or
 * release() must eventually be called; text() does not release by itself.
 */
export interface HttpResponse {
  readonly status: number;
  /** Lower-cased header names; repeated headers joined with `, `. */
  readonly headers: Readonly<Record<string, string>>;
  text(): Promise<string>;
  release(): void;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
  /** Close pooled connections. */
  close(): void;
}

// ---------------------------------------------------------------------------
// TLS mapping
// ---------------------------------------------------------------------------

function secureVersion(version: TlsVersion): SecureVersion {
  switch (version) {
    case TlsVersion.V10:
      return 'TLSv1';
    case TlsVersion.V11:
      return 'TLSv1.1';
    case TlsVersion.V12:
      return 'TLSv1.2';
    case TlsVersion.V13:
      return 'TLSv1.3';
  }
}

/** Map a TlsProfile onto `node:tls` connection options. */
export function toNodeTlsOptions(profile: TlsProfile): AgentOptions {
  const options: AgentOptions = {
    minVersion: secureVersion(profile.minVersion),
    ciphers: profile.cipherSuites.join(':'),
    ecdhCurve: profile.curvePreferences.join(':'),
    honorCipherOrder: profile.preferServerCipherOrder,
    rejectUnauthorized: !profile.insecureSkipVerify,
  };
  if (profile.rootCAs !== undefined && profile.rootCAs.length > 0) {
    options.ca = [...profile.rootCAs];
  }
  if (profile.serverName !== undefined) {
    options.servername = profile.serverName;
  }
  return options;
}

// ---------------------------------------------------------------------------
// Node implementation
// ---------------------------------------------------------------------------

export const POOL_MAX_TOTAL_SOCKETS = 100;
export const POOL_MAX_SOCKETS_PER_HOST = 10;
export const POOL_IDLE_TIMEOUT_MS = 90_000;

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    out[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return out;
}

class NodeHttpResponse implements HttpResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;

  constructor(private readonly message: IncomingMessage) {
    this.status = message.statusCode ?? 0;
    this.headers = flattenHeaders(message.headers);
  }

  async text(): Promise<string> {
    this.message.setEncoding('utf-8');
    let body = '';
    for await (const chunk of this.message) {
      body += String(chunk);
    }
    return body;
  }

  release(): void {
    if (this.message.complete) {
      return;
    }
    // Unread body: drop the socket rather than reading to the end.
    this.message.destroy();
  }
}

export class NodeHttpsTransport implements HttpTransport {
  private readonly agent: Agent;

  constructor(profile: TlsProfile) {
    this.agent = new Agent({
      keepAlive: true,
      maxSockets: POOL_MAX_SOCKETS_PER_HOST,
      maxTotalSockets: POOL_MAX_TOTAL_SOCKETS,
      maxFreeSockets: POOL_MAX_SOCKETS_PER_HOST,
      timeout: POOL_IDLE_TIMEOUT_MS,
      ...toNodeTlsOptions(profile),
    });
  }

  send(req: HttpRequest): Promise<HttpResponse> {
    if (req.url.protocol !== 'https:') {
      return Promise.reject(
        new InsecureConfigurationError(`Refusing to send a request over ${req.url.protocol} (HTTPS only).`),
      );
    }
    return new Promise<HttpResponse>((resolve, reject) => {
      const clientRequest = httpsRequest(
        req.url,
        {
          method: req.method,
          headers: req.body !== undefined
            ? { ...req.headers, 'Content-Length': String(Buffer.byteLength(req.body)) }
            : req.headers,
          agent: this.agent,
          ...(req.signal !== undefined ? { signal: req.signal } : {}),
        },
        (message) => resolve(new NodeHttpResponse(message)),
      );
      clientRequest.on('error', reject);
      if (req.body !== undefined) {
        clientRequest.write(req.body);
      }
      clientRequest.end();
    });
  }

  close(): void {
    this.agent.destroy();
  }
}
