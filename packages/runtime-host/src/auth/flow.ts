/**
 * xferctl Runtime Host — Authentication Flow
 *
 * login:   Start → AuthorizeUrlIssued → AwaitingCallback | AwaitingPaste
 *          → CodeObtained → TokenExchanged → Saved
 * logout:  load → delete
 * whoami:  load → (expired? TokenExpired) → introspect → (inactive? TokenExpired)
 *
 * The token store is written exactly once, after a successful exchange.
 * Any failure before that leaves the profile as it was.
 */

import {
  InvalidArgumentError,
  NOOP_LOG_SINK,
  TokenExpiredError,
  generateState,
  requireValidToken,
} from '@xferctl/kernel';
import type { IntrospectionResult, LogSink, TextSink, TokenBundle } from '@xferctl/kernel';

import { loadClientConfig } from '../config/env.js';
import type { Env } from '../config/env.js';
import { TokenStore } from '../tokens/token-store.js';
import {
  CALLBACK_PATH,
  CALLBACK_PORT,
  redirectUriFor,
  waitForCallback,
} from './callback-server.js';
import { DEFAULT_SCOPES, buildAuthorizationUrl } from './identity-provider.js';
import type { IdentityProviderClient } from './identity-provider.js';
import { promptForCode } from './prompt.js';

export type CodeExchanger = Pick<IdentityProviderClient, 'exchangeCode'>;
export type Introspector = Pick<IdentityProviderClient, 'introspect' | 'refresh'>;

// ---------------------------------------------------------------------------
// login
// ---------------------------------------------------------------------------

export interface LoginOptions {
  readonly env: Env;
  readonly profile: string;
  readonly idp: CodeExchanger;
  /** Where the authorization URL is shown (stdout). */
  readonly output: TextSink;
  readonly scopes?: ReadonlyArray<string> | undefined;
  /** Manual paste instead of the loopback listener. */
  readonly noLocalServer?: boolean | undefined;
  /** Required in manual mode. */
  readonly input?: NodeJS.ReadableStream | undefined;
  readonly promptOutput?: NodeJS.WritableStream | undefined;
  readonly port?: number | undefined;
  readonly deadlineMs?: number | undefined;
  readonly onListening?: ((port: number) => void) | undefined;
  readonly signal?: AbortSignal | undefined;
  readonly log?: LogSink | undefined;
}

export interface LoginResult {
  readonly profile: string;
  readonly tokenFile: string;
  readonly bundle: TokenBundle;
}

function presentUrl(output: TextSink, url: string): void {
  output.write('Please visit the following URL to authenticate:\n\n');
  output.write(`  ${url}\n\n`);
}

export async function login(options: LoginOptions): Promise<LoginResult> {
  const log = options.log ?? NOOP_LOG_SINK;
  const store = new TokenStore(options.env, log);
  // Reject an unsafe profile name before anything is shown to the operator.
  const tokenFile = store.path(options.profile);

  const client = loadClientConfig(options.env);
  const scopes = options.scopes !== undefined && options.scopes.length > 0 ? options.scopes : DEFAULT_SCOPES;
  const state = generateState();
  const authorizeUrl = (redirectUri: string): string =>
    buildAuthorizationUrl({ authBaseUrl: client.authBaseUrl, clientId: client.clientId, redirectUri, scopes, state });

  let code: string;
  let redirectUri: string;

  if (options.noLocalServer === true) {
    const input = options.input;
    if (input === undefined) {
      throw new InvalidArgumentError('Manual login needs an input stream to read the authorization code from.');
    }
    redirectUri = redirectUriFor(options.port ?? CALLBACK_PORT);
    presentUrl(options.output, authorizeUrl(redirectUri));
    log.debug('awaiting pasted authorization code');
    code = await promptForCode(input, options.promptOutput ?? process.stderr, options.signal);
  } else {
    let boundUri = redirectUriFor(options.port ?? CALLBACK_PORT);
    code = await waitForCallback({
      expectedState: state,
      port: options.port ?? CALLBACK_PORT,
      path: CALLBACK_PATH,
      signal: options.signal,
      deadlineMs: options.deadlineMs,
      onListening: (port) => {
        boundUri = redirectUriFor(port);
        presentUrl(options.output, authorizeUrl(boundUri));
        options.output.write(`Waiting for the authorization callback on ${boundUri} ...\n`);
        log.debug(`callback listener bound on port ${port}`);
        options.onListening?.(port);
      },
    });
    redirectUri = boundUri;
  }

  log.debug('authorization code received; exchanging');
  const bundle = await options.idp.exchangeCode(code, redirectUri, options.signal);
  store.save(options.profile, bundle);
  log.info(`saved credentials for profile "${options.profile}"`);
  return { profile: options.profile, tokenFile, bundle };
}

// ---------------------------------------------------------------------------
// logout
// ---------------------------------------------------------------------------

export interface LogoutOptions {
  readonly env: Env;
  readonly profile: string;
  readonly log?: LogSink | undefined;
}

export function logout(options: LogoutOptions): void {
  const store = new TokenStore(options.env, options.log);
  store.load(options.profile);
  store.delete(options.profile);
}

// ---------------------------------------------------------------------------
// whoami
// ---------------------------------------------------------------------------

export interface WhoamiOptions {
  readonly env: Env;
  readonly profile: string;
  readonly idp: Introspector;
  readonly now?: Date | undefined;
  /** Refresh an expired bundle instead of failing with TokenExpired. */
  readonly refresh?: boolean | undefined;
  readonly signal?: AbortSignal | undefined;
  readonly log?: LogSink | undefined;
}

export interface WhoamiResult {
  readonly profile: string;
  readonly identity: IntrospectionResult;
  readonly bundle: TokenBundle;
}

export async function whoami(options: WhoamiOptions): Promise<WhoamiResult> {
  const store = new TokenStore(options.env, options.log);
  const now = options.now ?? new Date();

  let bundle: TokenBundle;
  if (options.refresh === true) {
    bundle = await store.refreshIfNeeded(options.profile, options.idp, now, options.signal);
  } else {
    bundle = store.load(options.profile);
    requireValidToken(bundle, now);
  }

  const identity = await options.idp.introspect(bundle.accessCredential, options.signal);
  if (!identity.active) {
    throw new TokenExpiredError('Token is no longer active. Run `xferctl login` again.');
  }
  return { profile: options.profile, identity, bundle };
}
