/**
 * xferctl Runtime Host — Local Audit Store
 *
 * A single better-sqlite3 database at `<configRoot>/audit/audit.db`
 * holding one table, `audit_logs`, keyed by record id.
 *
 * Timestamps are stored as fixed-width millisecond UTC RFC 3339 text
 * (`YYYY-MM-DDTHH:MM:SS.sssZ`), so string comparison in SQL orders them
 * chronologically.
 *
 * Ingestion runs inside one transaction: every row is upserted with
 * INSERT OR REPLACE, and any failure (bad row, constraint, cancellation)
 * rolls the whole run back.
 */

import { dirname } from 'node:path';

import Database from 'better-sqlite3';

import {
  CancelledError,
  IngestionFailedError,
  LocalStoreError,
  buildAuditPredicates,
  formatStoredTimestamp,
  isXferError,
  parseRfc3339,
} from '@xferctl/kernel';
import type { AuditFilter, AuditRecord, RemoteAuditRecord } from '@xferctl/kernel';

import { ensurePrivateDir } from '../config/env.js';

type SqliteDatabase = InstanceType<typeof Database>;

const SCHEMA: ReadonlyArray<string> = [
  `CREATE TABLE IF NOT EXISTS audit_logs (
    id TEXT PRIMARY KEY,
    timestamp DATETIME NOT NULL,
    event_type TEXT,
    identity_id TEXT,
    username TEXT,
    resource TEXT,
    resource_id TEXT,
    action TEXT,
    result TEXT,
    message TEXT,
    client_ip TEXT,
    metadata TEXT
  )`,
  'CREATE INDEX IF NOT EXISTS idx_timestamp ON audit_logs(timestamp)',
  'CREATE INDEX IF NOT EXISTS idx_event_type ON audit_logs(event_type)',
  'CREATE INDEX IF NOT EXISTS idx_identity ON audit_logs(identity_id)',
  'CREATE INDEX IF NOT EXISTS idx_result ON audit_logs(result)',
];

const COLUMNS =
  'id, timestamp, event_type, identity_id, username, resource, resource_id, action, result, message, client_ip, metadata';

interface AuditRow {
  id: string;
  timestamp: string;
  event_type: string | null;
  identity_id: string | null;
  username: string | null;
  resource: string | null;
  resource_id: string | null;
  action: string | null;
  result: string | null;
  message: string | null;
  client_ip: string | null;
  metadata: string | null;
}

type InsertParams = [
  id: string,
  timestamp: string,
  eventType: string,
  identityId: string,
  username: string,
  resource: string,
  resourceId: string,
  action: string,
  result: string,
  message: string,
  clientIp: string,
  metadata: string,
];

export interface IngestOptions {
  /** Checked before each row; an abort rolls the run back. */
  readonly signal?: AbortSignal | undefined;
}

function parseMetadata(text: string | null, id: string): Record<string, string> {
  if (text === null || text === '') {
    return {};
  }
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new LocalStoreError(`Audit record ${id} has malformed metadata.`, { cause: err });
  }
  const out: Record<string, string> = {};
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    for (const [key, entry] of Object.entries(value)) {
      out[key] = typeof entry === 'string' ? entry : JSON.stringify(entry);
    }
  }
  return out;
}

function fromRow(row: AuditRow): AuditRecord {
  const timestamp = parseRfc3339(row.timestamp);
  if (timestamp === null) {
    throw new LocalStoreError(`Audit record ${row.id} has an unreadable timestamp "${row.timestamp}".`);
  }
  return {
    id: row.id,
    timestamp,
    eventType: row.event_type ?? '',
    identityId: row.identity_id ?? '',
    username: row.username ?? '',
    resource: row.resource ?? '',
    resourceId: row.resource_id ?? '',
    action: row.action ?? '',
    result: row.result ?? '',
    message: row.message ?? '',
    clientIp: row.client_ip ?? '',
    metadata: parseMetadata(row.metadata, row.id),
  };
}

function toInsertParams(record: RemoteAuditRecord, index: number): InsertParams {
  if (record.id === null || record.id === '') {
    throw new IngestionFailedError(`Audit record ${index} has no id.`, index);
  }
  if (record.timestamp === null) {
    throw new IngestionFailedError(`Audit record ${record.id} has no timestamp.`, index);
  }
  const timestamp = parseRfc3339(record.timestamp);
  if (timestamp === null) {
    throw new IngestionFailedError(
      `Audit record ${record.id} has an invalid timestamp "${record.timestamp}".`,
      index,
    );
  }
  return [
    record.id,
    formatStoredTimestamp(timestamp),
    record.eventType,
    record.identityId,
    record.username,
    record.resource,
    record.resourceId,
    record.action,
    record.result,
    record.message,
    record.clientIp,
    JSON.stringify(record.metadata),
  ];
}

export class AuditStore {
  private constructor(
    private readonly db: SqliteDatabase,
    readonly path: string,
  ) {}

  /**
   * Open (creating if needed) the database at `path` and ensure the schema.
   * The containing directory is created with mode 0700.
   *
   * @throws {LocalStoreError} on any open or schema failure
   */
  static open(path: string): AuditStore {
    ensurePrivateDir(dirname(path));
    let db: SqliteDatabase | undefined;
    try {
      db = new Database(path);
      for (const statement of SCHEMA) {
        db.prepare(statement).run();
      }
      return new AuditStore(db, path);
    } catch (err) {
      db?.close();
      throw new LocalStoreError(`Cannot open audit database ${path}.`, { cause: err });
    }
  }

  /**
   * Upsert `records` in server order inside one transaction.
   * Returns the number of rows inserted or replaced.
   *
   * @throws {IngestionFailedError} when any row fails; nothing is committed
   * @throws {CancelledError} when the signal is aborted; nothing is committed
   */
  ingest(records: ReadonlyArray<RemoteAuditRecord>, options: IngestOptions = {}): number {
    const insert = this.db.prepare<InsertParams>(
      `INSERT OR REPLACE INTO audit_logs (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    let index = 0;
    const run = this.db.transaction((batch: ReadonlyArray<RemoteAuditRecord>): number => {
      for (const record of batch) {
        if (options.signal?.aborted === true) {
          throw new CancelledError(`Audit ingestion cancelled at record ${index}; no records were saved.`);
        }
        insert.run(...toInsertParams(record, index));
        index++;
      }
      return batch.length;
    });

    try {
      return run(records);
    } catch (err) {
      if (isXferError(err)) {
        throw err;
      }
      const detail = err instanceof Error ? err.message : String(err);
      throw new IngestionFailedError(
        `Audit record ${index} could not be stored (${detail}); no records were saved.`,
        index,
        { cause: err },
      );
    }
  }

  /** Matching records, newest first. */
  query(filter: AuditFilter, limit?: number): AuditRecord[] {
    const { where, params } = buildAuditPredicates(filter);
    const bind: Array<string | number> = [...params];
    let sql = `SELECT ${COLUMNS} FROM audit_logs ${where} ORDER BY timestamp DESC`;
    if (limit !== undefined) {
      sql += ' LIMIT ?';
      bind.push(limit);
    }
    let rows: AuditRow[];
    try {
      rows = this.db.prepare<Array<string | number>, AuditRow>(sql).all(...bind);
    } catch (err) {
      throw new LocalStoreError('Audit query failed.', { cause: err });
    }
    return rows.map(fromRow);
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM audit_logs').get();
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
