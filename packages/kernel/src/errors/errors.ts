/**
 * xferctl Kernel — Error Taxonomy
 *
 * Every failure surfaced to the operator is an XferError carrying exactly one
 * ErrorKind. Each kind maps to one process exit code, so scripts can branch
 * on the failure class without parsing messages.
 *
 * Messages never contain credentials. Callers that wrap a lower-level error
 * pass it as `cause` rather than interpolating its text when that text may
 * echo secrets (request headers, token files).
 */

// ---------------------------------------------------------------------------
// Error Kinds
// ---------------------------------------------------------------------------

export enum ErrorKind {
  /** Malformed flag values, unsafe profile names, unparseable timestamps. */
  InvalidArgument = 'InvalidArgument',
  /** No token bundle is stored for the profile. */
  NotAuthenticated = 'NotAuthenticated',
  /** A bundle exists but has expired, or introspection reports it inactive. */
  TokenExpired = 'TokenExpired',
  /** The TLS validator rejected a profile. */
  InsecureConfiguration = 'InsecureConfiguration',
  /** Network or TLS failure before an HTTP status was received. */
  TransportError = 'TransportError',
  /** HTTP status >= 400 from the identity provider or the management API. */
  RemoteError = 'RemoteError',
  /** A response (or callback) did not match the expected shape. */
  ProtocolError = 'ProtocolError',
  /** Token file or audit database I/O or schema failure. */
  LocalStoreError = 'LocalStoreError',
  /** A row failed during audit ingestion; the run was rolled back. */
  IngestionFailed = 'IngestionFailed',
  /** A deadline elapsed at a specific stage. */
  Timeout = 'Timeout',
  /** The operator cancelled the command. */
  Cancelled = 'Cancelled',
}

/**
 * Process exit code per error kind. Code 1 is reserved for failures that
 * are not XferErrors (programming errors, commander usage errors).
 */
export const EXIT_CODES: Readonly<Record<ErrorKind, number>> = {
  [ErrorKind.InvalidArgument]: 2,
  [ErrorKind.NotAuthenticated]: 3,
  [ErrorKind.TokenExpired]: 4,
  [ErrorKind.InsecureConfiguration]: 5,
  [ErrorKind.TransportError]: 6,
  [ErrorKind.RemoteError]: 7,
  [ErrorKind.ProtocolError]: 8,
  [ErrorKind.LocalStoreError]: 9,
  [ErrorKind.IngestionFailed]: 10,
  [ErrorKind.Timeout]: 11,
  [ErrorKind.Cancelled]: 12,
} as const;

export const UNKNOWN_ERROR_EXIT_CODE = 1;

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export class XferError extends Error {
  readonly kind: ErrorKind;
  readonly exitCode: number;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.exitCode = EXIT_CODES[kind];
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// Concrete kinds
// ---------------------------------------------------------------------------

export class InvalidArgumentError extends XferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.InvalidArgument, message, options);
  }
}

export class NotAuthenticatedError extends XferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.NotAuthenticated, message, options);
  }
}

export class TokenExpiredError extends XferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.TokenExpired, message, options);
  }
}

export class InsecureConfigurationError extends XferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.InsecureConfiguration, message, options);
  }
}

export class TransportError extends XferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.TransportError, message, options);
  }
}

/**
 * HTTP status >= 400. A 401 stays a RemoteError; it is never converted to
 * NotAuthenticated, because the local bundle may well exist.
 */
export class RemoteError extends XferError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, context?: string) {
    const prefix = context !== undefined ? `${context}: ` : '';
    super(ErrorKind.RemoteError, `${prefix}HTTP ${status}: ${body}`);
    this.status = status;
    this.body = body;
  }
}

export class ProtocolError extends XferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.ProtocolError, message, options);
  }
}

export class LocalStoreError extends XferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.LocalStoreError, message, options);
  }
}

export class IngestionFailedError extends XferError {
  /** Zero-based index of the record that failed, when known. */
  readonly rowIndex: number | undefined;

  constructor(message: string, rowIndex?: number, options?: { cause?: unknown }) {
    super(ErrorKind.IngestionFailed, message, options);
    this.rowIndex = rowIndex;
  }
}

export class TimeoutError extends XferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.Timeout, message, options);
  }
}

export class CancelledError extends XferError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorKind.Cancelled, message, options);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isXferError(err: unknown): err is XferError {
  return err instanceof XferError;
}

/** Exit code for any thrown value. */
export function exitCodeFor(err: unknown): number {
  return isXferError(err) ? err.exitCode : UNKNOWN_ERROR_EXIT_CODE;
}

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return (
    err !== null &&
    typeof err === 'object' &&
    'code' in err &&
    err.code === code
  );
}
