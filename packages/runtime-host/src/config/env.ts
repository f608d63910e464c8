/**
 * xferctl Runtime Host — Environment and Paths
 *
 * The recognized environment variables are read exactly once, at startup,
 * into an immutable Env record that is passed explicitly to every
 * operation. Nothing below this module reads process.env.
 *
 * Layout under the config root:
 *
 *   <configRoot>/            mode 0700
 *     tokens/                mode 0700
 *       <profile>.json       mode 0600
 *     audit/                 mode 0700
 *       audit.db
 *
 * Precedence for the config root:
 *   1. XFERCTL_CONFIG_DIR (verbatim)
 *   2. <home>/.xferctl
 */

import { existsSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { LocalStoreError, validateProfileName } from '@xferctl/kernel';

// ---------------------------------------------------------------------------
// Env
// ---------------------------------------------------------------------------

export const ENV_CONFIG_DIR = 'XFERCTL_CONFIG_DIR';
export const ENV_CLIENT_ID = 'XFERCTL_CLIENT_ID';
export const ENV_CLIENT_SECRET = 'XFERCTL_CLIENT_SECRET';
export const ENV_AUTH_URL = 'XFERCTL_AUTH_URL';

/** Public client id used when XFERCTL_CLIENT_ID is unset. */
export const DEFAULT_CLIENT_ID = 'xferctl-cli';
/** Identity provider base; `/authorize`, `/token` and `/token/introspect` hang off it. */
export const DEFAULT_AUTH_BASE_URL = 'https://auth.xferctl.example/v2/oauth2';

const CONFIG_DIR_NAME = '.xferctl';

export interface Env {
  readonly configRoot?: string | undefined;
  readonly clientId?: string | undefined;
  readonly clientSecret?: string | undefined;
  readonly authBaseUrl?: string | undefined;
  /** Home directory, or undefined when it cannot be determined. */
  readonly home?: string | undefined;
}

export interface ClientConfig {
  readonly clientId: string;
  /** Absent for the public-client flow. */
  readonly clientSecret?: string | undefined;
  readonly authBaseUrl: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value !== '' ? value : undefined;
}

function safeHomedir(): string | undefined {
  try {
    return nonEmpty(homedir());
  } catch {
    // os.homedir() throws when the passwd entry is missing
    return undefined;
  }
}

/**
 * Snapshot the recognized variables. Empty strings count as unset.
 * `home` defaults to os.homedir(); pass it explicitly in tests.
 */
export function readEnv(
  source: Readonly<Record<string, string | undefined>> = process.env,
  home: string | undefined = safeHomedir(),
): Env {
  return Object.freeze({
    configRoot: nonEmpty(source[ENV_CONFIG_DIR]),
    clientId: nonEmpty(source[ENV_CLIENT_ID]),
    clientSecret: nonEmpty(source[ENV_CLIENT_SECRET]),
    authBaseUrl: nonEmpty(source[ENV_AUTH_URL]),
    home,
  });
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/**
 * @throws {LocalStoreError} when no override is set and the home directory
 *   is unknown
 */
export function configRoot(env: Env): string {
  if (env.configRoot !== undefined) {
    return env.configRoot;
  }
  if (env.home === undefined) {
    throw new LocalStoreError(
      `Cannot determine the home directory; set ${ENV_CONFIG_DIR} to choose a config directory.`,
    );
  }
  return join(env.home, CONFIG_DIR_NAME);
}

export function tokensDir(env: Env): string {
  return join(configRoot(env), 'tokens');
}

export function auditDir(env: Env): string {
  return join(configRoot(env), 'audit');
}

export function auditDbPath(env: Env): string {
  return join(auditDir(env), 'audit.db');
}

/** @throws {InvalidArgumentError} for unsafe profile names */
export function tokenPath(env: Env, profile: string): string {
  validateProfileName(profile);
  return join(tokensDir(env), `${profile}.json`);
}

// ---------------------------------------------------------------------------
// Directory creation
// ---------------------------------------------------------------------------

/**
 * Create `dir` (and missing parents) with mode 0700. An existing
 * directory keeps whatever mode it has.
 */
export function ensurePrivateDir(dir: string): string {
  if (existsSync(dir)) {
    return dir;
  }
  try {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  } catch (err) {
    throw new LocalStoreError(`Cannot create directory ${dir}.`, { cause: err });
  }
  return dir;
}

export function ensureConfigDir(env: Env): string {
  return ensurePrivateDir(configRoot(env));
}

export function ensureTokensDir(env: Env): string {
  ensureConfigDir(env);
  return ensurePrivateDir(tokensDir(env));
}

export function ensureAuditDir(env: Env): string {
  ensureConfigDir(env);
  return ensurePrivateDir(auditDir(env));
}

// ---------------------------------------------------------------------------
// Client configuration
// ---------------------------------------------------------------------------

export function loadClientConfig(env: Env): ClientConfig {
  return {
    clientId: env.clientId ?? DEFAULT_CLIENT_ID,
    clientSecret: env.clientSecret,
    authBaseUrl: (env.authBaseUrl ?? DEFAULT_AUTH_BASE_URL).replace(/\/+$/, ''),
  };
}
