/**
 * xferctl Runtime Host — Audit Operations
 *
 * load:  token → ApiClient → GET audit-logs → AuditStore.ingest
 * query: AuditStore.query, newest first, limit 100 by default
 * dump:  AuditStore.query without a limit, written as JSON or CSV
 *
 * Time flags are parsed before any remote or local work starts.
 */

import { writeFileSync } from 'node:fs';

import {
  InvalidArgumentError,
  LocalStoreError,
  NOOP_LOG_SINK,
  auditRecordsToCsv,
  parseRfc3339,
  requireValidToken,
  toAuditRecordJson,
} from '@xferctl/kernel';
import type { AuditFilter, AuditRecord, LogSink, RemoteAuditRecord, TlsProfile } from '@xferctl/kernel';

import { ApiClient } from '../api/client.js';
import { getAuditLogs } from '../api/audit-logs.js';
import { auditDbPath } from '../config/env.js';
import type { Env } from '../config/env.js';
import type { HttpTransport } from '../http/transport.js';
import { TokenStore } from '../tokens/token-store.js';
import { AuditStore } from './audit-store.js';

export const DEFAULT_LOAD_LIMIT = 1000;
export const DEFAULT_QUERY_LIMIT = 100;

export enum ExportFormat {
  Json = 'json',
  Csv = 'csv',
}

export function parseExportFormat(value: string): ExportFormat {
  switch (value) {
    case ExportFormat.Json:
      return ExportFormat.Json;
    case ExportFormat.Csv:
      return ExportFormat.Csv;
    default:
      throw new InvalidArgumentError(`Unsupported export format "${value}" (expected json or csv).`);
  }
}

/**
 * Parse an optional RFC 3339 flag value. `flag` names the flag in the
 * error message.
 */
export function parseTimeFlag(value: string | undefined, flag: string): Date | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = parseRfc3339(value);
  if (parsed === null) {
    throw new InvalidArgumentError(
      `Invalid ${flag} "${value}": expected RFC 3339, e.g. 2025-01-01T00:00:00Z.`,
    );
  }
  return parsed;
}

/** Run `work` against the store at the configured path, closing it afterwards. */
function withStore<T>(env: Env, work: (store: AuditStore) => T): T {
  const store = AuditStore.open(auditDbPath(env));
  try {
    return work(store);
  } finally {
    store.close();
  }
}

// ---------------------------------------------------------------------------
// load
// ---------------------------------------------------------------------------

export interface LoadAuditLogsOptions {
  readonly env: Env;
  readonly profile: string;
  readonly endpoint: string;
  readonly startTime?: Date | undefined;
  readonly endTime?: Date | undefined;
  readonly eventType?: string | undefined;
  readonly limit?: number | undefined;
  readonly transport?: HttpTransport | undefined;
  readonly tlsProfile?: TlsProfile | undefined;
  readonly allowInsecure?: boolean | undefined;
  readonly now?: Date | undefined;
  readonly signal?: AbortSignal | undefined;
  readonly log?: LogSink | undefined;
}

export interface LoadAuditLogsResult {
  readonly loaded: number;
  readonly database: string;
}

export async function loadAuditLogs(options: LoadAuditLogsOptions): Promise<LoadAuditLogsResult> {
  const log = options.log ?? NOOP_LOG_SINK;
  const bundle = new TokenStore(options.env, log).load(options.profile);
  requireValidToken(bundle, options.now ?? new Date());

  const client = new ApiClient({
    hostname: options.endpoint,
    accessToken: bundle.accessCredential,
    transport: options.transport,
    tlsProfile: options.tlsProfile,
    allowInsecure: options.allowInsecure,
    log,
  });
  let records: RemoteAuditRecord[];
  try {
    records = await getAuditLogs(
      client,
      {
        startTime: options.startTime,
        endTime: options.endTime,
        eventType: options.eventType,
        limit: options.limit ?? DEFAULT_LOAD_LIMIT,
      },
      options.signal,
    );
  } finally {
    client.close();
  }
  log.info(`fetched ${records.length} audit record(s) from ${options.endpoint}`);

  const database = auditDbPath(options.env);
  const loaded = withStore(options.env, (store) => store.ingest(records, { signal: options.signal }));
  return { loaded, database };
}

// ---------------------------------------------------------------------------
// query / dump
// ---------------------------------------------------------------------------

export interface QueryAuditLogsOptions {
  readonly env: Env;
  readonly filter: AuditFilter;
  readonly limit?: number | undefined;
}

export function queryAuditLogs(options: QueryAuditLogsOptions): AuditRecord[] {
  const limit = options.limit ?? DEFAULT_QUERY_LIMIT;
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new InvalidArgumentError(`Invalid limit ${limit}: expected a positive integer.`);
  }
  return withStore(options.env, (store) => store.query(options.filter, limit));
}

export interface DumpAuditLogsOptions {
  readonly env: Env;
  readonly filter: AuditFilter;
  readonly format: ExportFormat;
  readonly output: string;
}

export interface DumpAuditLogsResult {
  readonly written: number;
  readonly output: string;
}

export function renderAuditExport(records: ReadonlyArray<AuditRecord>, format: ExportFormat): string {
  switch (format) {
    case ExportFormat.Csv:
      return auditRecordsToCsv(records);
    case ExportFormat.Json:
      return `${JSON.stringify(records.map(toAuditRecordJson), null, 2)}\n`;
  }
}

export function dumpAuditLogs(options: DumpAuditLogsOptions): DumpAuditLogsResult {
  const records = withStore(options.env, (store) => store.query(options.filter));
  try {
    writeFileSync(options.output, renderAuditExport(records, options.format), 'utf-8');
  } catch (err) {
    throw new LocalStoreError(`Cannot write export file ${options.output}.`, { cause: err });
  }
  return { written: records.length, output: options.output };
}
