/**
 * xferctl Kernel — TLS Profile Types
 *
 * A TlsProfile is the transport-security configuration installed on every
 * HTTPS connection the CLI opens. Protocol versions and cipher suites use
 * OpenSSL names so a profile maps directly onto `node:tls` options.
 */

// ---------------------------------------------------------------------------
// Protocol versions
// ---------------------------------------------------------------------------

export enum TlsVersion {
  V10 = 'TLSv1',
  V11 = 'TLSv1.1',
  V12 = 'TLSv1.2',
  V13 = 'TLSv1.3',
}

/**
 * Numeric ordering of protocol versions. Use this to compare versions;
 * string comparison of the enum values is not meaningful.
 */
export const TLS_VERSION_ORDER: Readonly<Record<TlsVersion, number>> = {
  [TlsVersion.V10]: 10,
  [TlsVersion.V11]: 11,
  [TlsVersion.V12]: 12,
  [TlsVersion.V13]: 13,
} as const;

// ---------------------------------------------------------------------------
// Curves
// ---------------------------------------------------------------------------

export enum Curve {
  X25519 = 'X25519',
  P256 = 'P-256',
  P384 = 'P-384',
}

/** OpenSSL cipher suite name, e.g. `ECDHE-RSA-AES128-GCM-SHA256`. */
export type CipherSuite = string;

// ---------------------------------------------------------------------------
// Profile
// ---------------------------------------------------------------------------

export interface TlsProfile {
  /** Lowest protocol version the client will negotiate. */
  minVersion: TlsVersion;
  /** Ordered TLS 1.2 cipher suites. TLS 1.3 suites are fixed by the runtime. */
  cipherSuites: CipherSuite[];
  /** Ordered key-exchange groups. */
  curvePreferences: Curve[];
  preferServerCipherOrder: boolean;
  /** SNI / certificate hostname override. */
  serverName?: string | undefined;
  /** PEM-encoded trust anchors replacing the default CA set. */
  rootCAs?: string[] | undefined;
  /** Certificate verification is on unless this is true. */
  insecureSkipVerify: boolean;
}

/**
 * The recognized profile options. Each one mutates a fresh default profile
 * in place; see customTlsProfile().
 */
export interface TlsOptions {
  readonly minVersion?: TlsVersion.V12 | TlsVersion.V13 | undefined;
  readonly insecureSkipVerify?: boolean | undefined;
  readonly rootCAs?: ReadonlyArray<string> | undefined;
  readonly serverName?: string | undefined;
}
