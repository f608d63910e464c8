/**
 * xferctl Runtime Host — API Client
 *
 * Composes requests against `https://<hostname>/api/`, injects the bearer
 * credential, and decodes JSON responses. Every command that talks to an
 * endpoint goes through one ApiClient.
 *
 * Construction order:
 *   1. hostname must be non-empty         (InvalidArgumentError)
 *   2. base URL `https://<hostname>/api/`
 *   3. TLS profile: supplied, or secureTlsProfile()
 *   4. validateTlsProfile()               (InsecureConfigurationError)
 *   5. transport: supplied, or NodeHttpsTransport over the profile
 *
 * Response discipline: a response returned by request() belongs to the
 * caller, who passes it to decode() or drain(). Both release it on every
 * path.
 */

import {
  InvalidArgumentError,
  NOOP_LOG_SINK,
  ProtocolError,
  secureTlsProfile,
  validateTlsProfile,
} from '@xferctl/kernel';
import type { LogSink, TlsProfile } from '@xferctl/kernel';

import { execute } from '../http/execute.js';
import { NodeHttpsTransport } from '../http/transport.js';
import type { HttpResponse, HttpTransport } from '../http/transport.js';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT = 'xferctl/0.1.0';

export interface ClientOptions {
  readonly hostname: string;
  readonly accessToken?: string | undefined;
  readonly transport?: HttpTransport | undefined;
  readonly tlsProfile?: TlsProfile | undefined;
  /** Required for a profile with certificate verification disabled. */
  readonly allowInsecure?: boolean | undefined;
  readonly userAgent?: string | undefined;
  /** Total request deadline, including the body. */
  readonly timeoutMs?: number | undefined;
  readonly log?: LogSink | undefined;
}

export interface RequestOptions {
  /** Serialized as JSON. Undefined properties are left out of the payload. */
  readonly body?: unknown;
  readonly signal?: AbortSignal | undefined;
}

export type Guard<T> = (value: unknown) => value is T;

export class ApiClient {
  readonly baseUrl: URL;
  readonly tlsProfile: TlsProfile;
  private readonly transport: HttpTransport;
  private readonly accessToken: string | undefined;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly log: LogSink;

  constructor(options: ClientOptions) {
    if (options.hostname.trim() === '') {
      throw new InvalidArgumentError('Endpoint hostname is required.');
    }
    this.baseUrl = new URL(`https://${options.hostname}/api/`);

    const profile = options.tlsProfile ?? secureTlsProfile();
    validateTlsProfile(profile, options.allowInsecure ?? false);
    this.tlsProfile = profile;

    this.transport = options.transport ?? new NodeHttpsTransport(profile);
    this.accessToken = options.accessToken;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.log ?? NOOP_LOG_SINK;
  }

  /** `path` is relative to the base URL; a leading `/` is dropped. */
  resolve(path: string): URL {
    return new URL(`${this.baseUrl.href}${path.replace(/^\/+/, '')}`);
  }

  async request(method: string, path: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const url = this.resolve(path);
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
    };

    let body: string | undefined;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers['Content-Type'] = 'application/json';
    }
    if (this.accessToken !== undefined && this.accessToken !== '') {
      headers['Authorization'] = `Bearer ${this.accessToken}`;
    }

    this.log.debug(`${method} ${url.href}`);
    const response = await execute(
      this.transport,
      { method, url, headers, ...(body !== undefined ? { body } : {}) },
      { context: `${method} ${path}`, timeoutMs: this.timeoutMs, signal: options.signal },
    );
    this.log.debug(`${method} ${url.href} → ${response.status}`);
    return response;
  }

  /**
   * Read the whole body and parse it as JSON, releasing the response on
   * every path. With a guard, a value of the wrong shape is a ProtocolError.
   */
  decode(response: HttpResponse): Promise<unknown>;
  decode<T>(response: HttpResponse, guard: Guard<T>, what?: string): Promise<T>;
  async decode<T>(response: HttpResponse, guard?: Guard<T>, what = 'response'): Promise<unknown> {
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
      throw new ProtocolError(`Cannot decode ${what}: body is not valid JSON.`, { cause: err });
    }
    if (guard !== undefined && !guard(value)) {
      throw new ProtocolError(`Cannot decode ${what}: unexpected shape.`);
    }
    return value;
  }

  /** Release a response whose body is not needed (DELETE, POST without result). */
  drain(response: HttpResponse): void {
    response.release();
  }

  close(): void {
    this.transport.close();
  }
}
