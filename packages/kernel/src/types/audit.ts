/**
 * xferctl Kernel — Audit Record Types
 *
 * AuditRecord is the local, normalized form of one event row from the
 * remote audit resource. RemoteAuditRecord is the decoded wire form, which
 * may be incomplete; ingestion is where completeness is enforced.
 */

/** Result values the remote API documents. Other strings are passed through. */
export type AuditResult = 'success' | 'failure' | (string & {});

export interface AuditRecord {
  /** Globally unique record id (primary key of the local table). */
  readonly id: string;
  readonly timestamp: Date;
  readonly eventType: string;
  /** Actor identity id. */
  readonly identityId: string;
  /** Actor username. */
  readonly username: string;
  /** Resource kind. */
  readonly resource: string;
  readonly resourceId: string;
  readonly action: string;
  readonly result: AuditResult;
  readonly message: string;
  readonly clientIp: string;
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * A record as delivered by the server. `id` and `timestamp` are nullable
 * here because the server may omit them; the ingestor rejects such rows.
 */
export interface RemoteAuditRecord {
  readonly id: string | null;
  readonly timestamp: string | null;
  readonly eventType: string;
  readonly identityId: string;
  readonly username: string;
  readonly resource: string;
  readonly resourceId: string;
  readonly action: string;
  readonly result: string;
  readonly message: string;
  readonly clientIp: string;
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Filter predicates shared by `audit query` and `audit dump`. Every field
 * is optional; absent fields do not constrain the result.
 */
export interface AuditFilter {
  readonly startTime?: Date | undefined;
  readonly endTime?: Date | undefined;
  readonly eventType?: string | undefined;
  readonly identityId?: string | undefined;
  readonly action?: string | undefined;
  readonly result?: string | undefined;
}

/** JSON rendering of an AuditRecord (export and `--format json`). */
export interface AuditRecordJson {
  id: string;
  timestamp: string;
  event_type: string;
  identity_id: string;
  username: string;
  resource: string;
  resource_id: string;
  action: string;
  result: string;
  message: string;
  client_ip: string;
  metadata: Record<string, string>;
}
