/**
 * xferctl Kernel — Token Bundle Types
 *
 * A TokenBundle is the record produced by a successful authorization code
 * exchange and stored, one per profile, under `<config-root>/tokens/`.
 *
 * The expiry is always an absolute instant. Durations from the identity
 * provider (`expires_in`) are converted once at exchange time and never
 * persisted, so a clock change cannot silently extend validity.
 */

export interface TokenBundle {
  /** Opaque bearer credential. Never logged. */
  readonly accessCredential: string;
  /** Opaque refresh credential, present when offline access was granted. */
  readonly refreshCredential?: string | undefined;
  /** Absolute expiry instant. */
  readonly expiresAt: Date;
  /** Granted scopes, in grant order, duplicates collapsed. */
  readonly scopes: ReadonlyArray<string>;
  /** Identifier of the resource server the access credential is for. */
  readonly resourceServer: string;
}

/**
 * On-disk form of a TokenBundle (`<profile>.json`).
 * `expires_at` is RFC 3339; there are no relative times.
 */
export interface TokenBundleFile {
  access_credential: string;
  refresh_credential?: string;
  expires_at: string;
  scopes: string[];
  resource_server: string;
}

/** Identity fields returned by token introspection. */
export interface IntrospectionResult {
  readonly active: boolean;
  readonly subject?: string | undefined;
  readonly username?: string | undefined;
  readonly email?: string | undefined;
  readonly name?: string | undefined;
}
