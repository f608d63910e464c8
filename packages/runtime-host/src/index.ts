/**
 * @xferctl/runtime-host
 *
 * xferctl runtime host — everything that touches the filesystem, the
 * network, or the audit database. Depends on @xferctl/kernel for types,
 * errors, and policy; implements them with Node.js built-ins and
 * better-sqlite3.
 *
 * No kernel code imports from this package.
 */

// Environment, paths, client configuration
export type { ClientConfig, Env } from './config/env.js';
export {
  DEFAULT_AUTH_BASE_URL,
  DEFAULT_CLIENT_ID,
  ENV_AUTH_URL,
  ENV_CLIENT_ID,
  ENV_CLIENT_SECRET,
  ENV_CONFIG_DIR,
  auditDbPath,
  auditDir,
  configRoot,
  ensureAuditDir,
  ensureConfigDir,
  ensurePrivateDir,
  ensureTokensDir,
  loadClientConfig,
  readEnv,
  tokenPath,
  tokensDir,
} from './config/env.js';

// Token store
export type { TokenRefresher } from './tokens/token-store.js';
export { TokenStore } from './tokens/token-store.js';

// HTTPS transport
export type { HttpRequest, HttpResponse, HttpTransport } from './http/transport.js';
export {
  NodeHttpsTransport,
  POOL_IDLE_TIMEOUT_MS,
  POOL_MAX_SOCKETS_PER_HOST,
  POOL_MAX_TOTAL_SOCKETS,
  toNodeTlsOptions,
} from './http/transport.js';
export type { ExecuteOptions } from './http/execute.js';
export { execute } from './http/execute.js';

// API client and collaborator calls
export type { ClientOptions, Guard, RequestOptions } from './api/client.js';
export { ApiClient, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './api/client.js';
export type { Endpoint, EndpointInfo } from './api/endpoint.js';
export { getEndpoint, getInfo } from './api/endpoint.js';
export type { CreateRoleRequest, ListRolesOptions, Role, RoleList } from './api/roles.js';
export { createRole, deleteRole, getRole, listRoles } from './api/roles.js';
export type { AuditQueryParams } from './api/audit-logs.js';
export { auditLogsPath, decodeAuditRecord, getAuditLogs } from './api/audit-logs.js';

// Authentication
export type { AuthorizationUrlParams, IdentityProviderOptions } from './auth/identity-provider.js';
export { DEFAULT_SCOPES, IdentityProviderClient, buildAuthorizationUrl } from './auth/identity-provider.js';
export type { WaitForCallbackOptions } from './auth/callback-server.js';
export {
  CALLBACK_DEADLINE_MS,
  CALLBACK_HOST,
  CALLBACK_PATH,
  CALLBACK_PORT,
  SHUTDOWN_DRAIN_MS,
  SingleSlot,
  redirectUriFor,
  waitForCallback,
} from './auth/callback-server.js';
export { promptForCode } from './auth/prompt.js';
export type {
  CodeExchanger,
  Introspector,
  LoginOptions,
  LoginResult,
  LogoutOptions,
  WhoamiOptions,
  WhoamiResult,
} from './auth/flow.js';
export { login, logout, whoami } from './auth/flow.js';

// Audit store and operations
export type { IngestOptions } from './audit/audit-store.js';
export { AuditStore } from './audit/audit-store.js';
export type {
  DumpAuditLogsOptions,
  DumpAuditLogsResult,
  LoadAuditLogsOptions,
  LoadAuditLogsResult,
  QueryAuditLogsOptions,
} from './audit/ingestor.js';
export {
  DEFAULT_LOAD_LIMIT,
  DEFAULT_QUERY_LIMIT,
  ExportFormat,
  dumpAuditLogs,
  loadAuditLogs,
  parseExportFormat,
  parseTimeFlag,
  queryAuditLogs,
  renderAuditExport,
} from './audit/ingestor.js';
