/**
 * xferctl Kernel — TLS Policy
 *
 * Produces the hardened TLS profile used for every HTTPS connection and
 * validates profiles supplied by callers.
 *
 * Default profile:
 *   - TLS 1.2 minimum
 *   - AEAD-only TLS 1.2 suites: ECDHE first, RSA-GCM as fallback
 *   - Curves X25519, P-256, P-384 (in that order)
 *   - Server cipher order preferred, certificate verification on
 *
 * validateTlsProfile() is called by the API client at construction time,
 * so an insecure profile never reaches a socket.
 */

import { InsecureConfigurationError } from '../errors/errors.js';
import { Curve, TLS_VERSION_ORDER, TlsVersion } from '../types/tls.js';
import type { CipherSuite, TlsOptions, TlsProfile } from '../types/tls.js';

// ---------------------------------------------------------------------------
// Cipher suite lists
// ---------------------------------------------------------------------------

/** Approved TLS 1.2 suites, in preference order. */
export const SECURE_CIPHER_SUITES: ReadonlyArray<CipherSuite> = [
  'ECDHE-RSA-AES128-GCM-SHA256',
  'ECDHE-RSA-AES256-GCM-SHA384',
  'ECDHE-ECDSA-AES128-GCM-SHA256',
  'ECDHE-ECDSA-AES256-GCM-SHA384',
  'AES128-GCM-SHA256',
  'AES256-GCM-SHA384',
];

/**
 * Suites rejected by validateTlsProfile(): RC4, 3DES and CBC-mode suites.
 */
export const WEAK_CIPHER_SUITES: ReadonlySet<CipherSuite> = new Set([
  'RC4-SHA',
  'RC4-MD5',
  'DES-CBC3-SHA',
  'AES128-SHA',
  'AES256-SHA',
  'AES128-SHA256',
  'AES256-SHA256',
  'ECDHE-RSA-RC4-SHA',
  'ECDHE-RSA-DES-CBC3-SHA',
  'ECDHE-RSA-AES128-SHA',
  'ECDHE-RSA-AES256-SHA',
  'ECDHE-RSA-AES128-SHA256',
  'ECDHE-RSA-AES256-SHA384',
  'ECDHE-ECDSA-RC4-SHA',
  'ECDHE-ECDSA-AES128-SHA',
  'ECDHE-ECDSA-AES256-SHA',
  'ECDHE-ECDSA-AES128-SHA256',
  'ECDHE-ECDSA-AES256-SHA384',
]);

/** OpenSSL → IANA names for the suites this module knows about. */
const IANA_CIPHER_NAMES: Readonly<Record<string, string>> = {
  'ECDHE-RSA-AES128-GCM-SHA256': 'TLS_ECDHE_RSA_WITH_AES_128_GCM_SHA256',
  'ECDHE-RSA-AES256-GCM-SHA384': 'TLS_ECDHE_RSA_WITH_AES_256_GCM_SHA384',
  'ECDHE-ECDSA-AES128-GCM-SHA256': 'TLS_ECDHE_ECDSA_WITH_AES_128_GCM_SHA256',
  'ECDHE-ECDSA-AES256-GCM-SHA384': 'TLS_ECDHE_ECDSA_WITH_AES_256_GCM_SHA384',
  'AES128-GCM-SHA256': 'TLS_RSA_WITH_AES_128_GCM_SHA256',
  'AES256-GCM-SHA384': 'TLS_RSA_WITH_AES_256_GCM_SHA384',
  'RC4-SHA': 'TLS_RSA_WITH_RC4_128_SHA',
  'DES-CBC3-SHA': 'TLS_RSA_WITH_3DES_EDE_CBC_SHA',
  'AES128-SHA': 'TLS_RSA_WITH_AES_128_CBC_SHA',
  'AES256-SHA': 'TLS_RSA_WITH_AES_256_CBC_SHA',
  'ECDHE-RSA-RC4-SHA': 'TLS_ECDHE_RSA_WITH_RC4_128_SHA',
  'ECDHE-RSA-DES-CBC3-SHA': 'TLS_ECDHE_RSA_WITH_3DES_EDE_CBC_SHA',
  'ECDHE-RSA-AES128-SHA': 'TLS_ECDHE_RSA_WITH_AES_128_CBC_SHA',
  'ECDHE-RSA-AES256-SHA': 'TLS_ECDHE_RSA_WITH_AES_256_CBC_SHA',
};

// ---------------------------------------------------------------------------
// Profile construction
// ---------------------------------------------------------------------------

/**
 * Return a fresh hardened profile. Each call returns a new object, so
 * callers may mutate the result.
 */
export function secureTlsProfile(): TlsProfile {
  return {
    minVersion: TlsVersion.V12,
    cipherSuites: [...SECURE_CIPHER_SUITES],
    curvePreferences: [Curve.X25519, Curve.P256, Curve.P384],
    preferServerCipherOrder: true,
    insecureSkipVerify: false,
  };
}

/**
 * Start from secureTlsProfile() and apply the recognized options.
 * The result is not validated here; see validateTlsProfile().
 */
export function customTlsProfile(options: TlsOptions): TlsProfile {
  const profile = secureTlsProfile();
  if (options.minVersion !== undefined) {
    profile.minVersion = options.minVersion;
  }
  if (options.insecureSkipVerify !== undefined) {
    profile.insecureSkipVerify = options.insecureSkipVerify;
  }
  if (options.rootCAs !== undefined) {
    profile.rootCAs = [...options.rootCAs];
  }
  if (options.serverName !== undefined && options.serverName !== '') {
    profile.serverName = options.serverName;
  }
  return profile;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/**
 * Reject profiles that do not meet the transport-security policy.
 *
 * @throws {InsecureConfigurationError} when the profile is absent, its
 *   minimum version is below TLS 1.2, verification is disabled without
 *   `allowInsecure`, or any configured suite is in WEAK_CIPHER_SUITES
 */
export function validateTlsProfile(profile: TlsProfile | null | undefined, allowInsecure: boolean): void {
  if (profile === null || profile === undefined) {
    throw new InsecureConfigurationError('TLS profile is missing.');
  }

  if (TLS_VERSION_ORDER[profile.minVersion] < TLS_VERSION_ORDER[TlsVersion.V12]) {
    throw new InsecureConfigurationError(
      `TLS versions below 1.2 are not allowed (found: ${tlsVersionName(profile.minVersion)}).`,
    );
  }

  if (profile.insecureSkipVerify && !allowInsecure) {
    throw new InsecureConfigurationError(
      'Certificate verification is disabled. Pass --insecure only for local test servers.',
    );
  }

  for (const suite of profile.cipherSuites) {
    if (WEAK_CIPHER_SUITES.has(suite)) {
      throw new InsecureConfigurationError(`Weak cipher suite detected: ${cipherSuiteName(suite)}.`);
    }
  }
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export function tlsVersionName(version: string): string {
  switch (version) {
    case TlsVersion.V10:
      return 'TLS 1.0';
    case TlsVersion.V11:
      return 'TLS 1.1';
    case TlsVersion.V12:
      return 'TLS 1.2';
    case TlsVersion.V13:
      return 'TLS 1.3';
    default:
      return `Unknown (${version})`;
  }
}

/** IANA name for a known suite; otherwise the OpenSSL name unchanged. */
export function cipherSuiteName(suite: CipherSuite): string {
  return IANA_CIPHER_NAMES[suite] ?? suite;
}
