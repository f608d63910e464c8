/**
 * @xferctl/kernel
 *
 * xferctl kernel — shared types, error taxonomy, TLS policy, output
 * formatting, token bundle rules, and audit query/export encoding.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:net, node:http(s), or any database driver. node:crypto is used for
 * nonce generation and node:util for string formatting only.
 *
 * File, network, and database I/O live in @xferctl/runtime-host.
 */

// Types
export type { CipherSuite, TlsOptions, TlsProfile } from './types/tls.js';
export { Curve, TLS_VERSION_ORDER, TlsVersion } from './types/tls.js';

export type { IntrospectionResult, TokenBundle, TokenBundleFile } from './types/token.js';

export type {
  AuditFilter,
  AuditRecord,
  AuditRecordJson,
  AuditResult,
  RemoteAuditRecord,
} from './types/audit.js';

// Errors
export {
  CancelledError,
  EXIT_CODES,
  ErrorKind,
  IngestionFailedError,
  InsecureConfigurationError,
  InvalidArgumentError,
  LocalStoreError,
  NotAuthenticatedError,
  ProtocolError,
  RemoteError,
  TimeoutError,
  TokenExpiredError,
  TransportError,
  UNKNOWN_ERROR_EXIT_CODE,
  XferError,
  exitCodeFor,
  isNodeError,
  isXferError,
} from './errors/errors.js';

// Log sink interface (implementation lives in the CLI)
export type { LogSink } from './logging/log-sink.js';
export { NOOP_LOG_SINK } from './logging/log-sink.js';

// TLS policy
export {
  SECURE_CIPHER_SUITES,
  WEAK_CIPHER_SUITES,
  cipherSuiteName,
  customTlsProfile,
  secureTlsProfile,
  tlsVersionName,
  validateTlsProfile,
} from './tls/policy.js';

// Output
export type { OutputFormatter, TextSink } from './output/formatter.js';
export {
  JsonFormatter,
  OutputFormat,
  TextFormatter,
  createFormatter,
  parseOutputFormat,
} from './output/formatter.js';

// Auth
export { STATE_PREFIX, generateState } from './auth/state.js';

// Tokens
export {
  DEFAULT_PROFILE,
  isTokenValid,
  normalizeScopes,
  parseScopeList,
  parseTokenBundle,
  requireValidToken,
  serializeTokenBundle,
  validateProfileName,
} from './tokens/bundle.js';

// Audit
export type { AuditPredicates } from './audit/query.js';
export {
  buildAuditPredicates,
  formatRfc3339,
  formatStoredTimestamp,
  parseRfc3339,
  toAuditRecordJson,
} from './audit/query.js';
export {
  AUDIT_CSV_HEADER,
  auditRecordToCsvFields,
  auditRecordsToCsv,
  encodeCsvRow,
} from './audit/csv.js';
