/**
 * xferctl Kernel — Token Bundle Rules
 *
 * Profile-name safety, validity, and the on-disk codec for TokenBundle.
 * The Token Store in runtime-host does the file I/O; everything here is pure.
 */

import { InvalidArgumentError, LocalStoreError, TokenExpiredError } from '../errors/errors.js';
import type { TokenBundle, TokenBundleFile } from '../types/token.js';

export const DEFAULT_PROFILE = 'default';

// ---------------------------------------------------------------------------
// Profile names
// ---------------------------------------------------------------------------

/**
 * A profile name becomes a file name under the tokens directory.
 *
 * @throws {InvalidArgumentError} when empty, containing a path separator or
 *   `..`, or starting with `.`
 */
export function validateProfileName(profile: string): void {
  if (profile === '') {
    throw new InvalidArgumentError('Profile name must not be empty.');
  }
  if (profile.includes('/') || profile.includes('\\')) {
    throw new InvalidArgumentError(`Profile name "${profile}" must not contain path separators.`);
  }
  if (profile.includes('..')) {
    throw new InvalidArgumentError(`Profile name "${profile}" must not contain "..".`);
  }
  if (profile.startsWith('.')) {
    throw new InvalidArgumentError(`Profile name "${profile}" must not start with ".".`);
  }
}

// ---------------------------------------------------------------------------
// Scopes and validity
// ---------------------------------------------------------------------------

/** Keep first occurrences, in order. Empty entries are dropped. */
export function normalizeScopes(scopes: ReadonlyArray<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const scope of scopes) {
    if (scope === '' || seen.has(scope)) continue;
    seen.add(scope);
    out.push(scope);
  }
  return out;
}

/** Split a space-separated `--scopes` value. */
export function parseScopeList(value: string): string[] {
  return normalizeScopes(value.split(/\s+/));
}

export function isTokenValid(bundle: TokenBundle, now: Date): boolean {
  return bundle.accessCredential !== '' && bundle.expiresAt.getTime() > now.getTime();
}

export function requireValidToken(bundle: TokenBundle, now: Date): void {
  if (!isTokenValid(bundle, now)) {
    throw new TokenExpiredError('Stored token has expired. Run `xferctl login` again.');
  }
}

// ---------------------------------------------------------------------------
// Codec
// ---------------------------------------------------------------------------

export function serializeTokenBundle(bundle: TokenBundle): string {
  const file: TokenBundleFile = {
    access_credential: bundle.accessCredential,
    expires_at: bundle.expiresAt.toISOString(),
    scopes: [...bundle.scopes],
    resource_server: bundle.resourceServer,
  };
  if (bundle.refreshCredential !== undefined) {
    file.refresh_credential = bundle.refreshCredential;
  }
  return `${JSON.stringify(file, null, 2)}\n`;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isTokenBundleFile(value: unknown): value is TokenBundleFile {
  if (value === null || typeof value !== 'object') return false;
  if (!('access_credential' in value) || typeof value.access_credential !== 'string') return false;
  if (!('expires_at' in value) || typeof value.expires_at !== 'string') return false;
  if (!('scopes' in value) || !isStringArray(value.scopes)) return false;
  if (!('resource_server' in value) || typeof value.resource_server !== 'string') return false;
  if ('refresh_credential' in value && typeof value.refresh_credential !== 'string') return false;
  return true;
}

/**
 * Decode the on-disk form. The error message names the source only;
 * file content is never echoed since it holds credentials.
 *
 * @throws {LocalStoreError} on malformed JSON, missing fields or a bad expiry
 */
export function parseTokenBundle(text: string, source: string): TokenBundle {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new LocalStoreError(`Token file ${source} is not valid JSON.`, { cause: err });
  }
  if (!isTokenBundleFile(raw)) {
    throw new LocalStoreError(`Token file ${source} is missing required fields.`);
  }
  const expiresMs = Date.parse(raw.expires_at);
  if (Number.isNaN(expiresMs)) {
    throw new LocalStoreError(`Token file ${source} has an invalid expires_at.`);
  }
  return {
    accessCredential: raw.access_credential,
    ...(raw.refresh_credential !== undefined ? { refreshCredential: raw.refresh_credential } : {}),
    expiresAt: new Date(expiresMs),
    scopes: normalizeScopes(raw.scopes),
    resourceServer: raw.resource_server,
  };
}
