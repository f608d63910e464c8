/**
 * xferctl Kernel — Audit Query Predicates
 *
 * Translates an AuditFilter into a parameterized WHERE clause. User values
 * only ever travel in `params`; the clause text is built from fixed column
 * names.
 *
 * Timestamps are compared as strings in the store, so both stored values and
 * bounds use the fixed-width millisecond UTC form of formatStoredTimestamp().
 * formatRfc3339() is the second-precision form used for display and export.
 */

import type { AuditFilter, AuditRecord, AuditRecordJson } from '../types/audit.js';

export interface AuditPredicates {
  /** `WHERE ...` including the keyword, or the empty string. */
  readonly where: string;
  readonly params: ReadonlyArray<string>;
}

// ---------------------------------------------------------------------------
// Timestamps
// ---------------------------------------------------------------------------

const RFC3339 =
  /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

/** `YYYY-MM-DDTHH:MM:SSZ`. Sub-second precision is dropped. */
export function formatRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/** `YYYY-MM-DDTHH:MM:SS.sssZ`, the form written to and compared in the store. */
export function formatStoredTimestamp(date: Date): string {
  return date.toISOString();
}

/** Strict RFC 3339 parse. Returns null for anything else. */
export function parseRfc3339(value: string): Date | null {
  if (!RFC3339.test(value)) {
    return null;
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

export function buildAuditPredicates(filter: AuditFilter): AuditPredicates {
  const clauses: string[] = [];
  const params: string[] = [];

  if (filter.startTime !== undefined) {
    clauses.push('timestamp >= ?');
    params.push(formatStoredTimestamp(filter.startTime));
  }
  if (filter.endTime !== undefined) {
    clauses.push('timestamp <= ?');
    params.push(formatStoredTimestamp(filter.endTime));
  }
  if (filter.eventType !== undefined && filter.eventType !== '') {
    clauses.push('event_type = ?');
    params.push(filter.eventType);
  }
  if (filter.identityId !== undefined && filter.identityId !== '') {
    clauses.push('identity_id = ?');
    params.push(filter.identityId);
  }
  if (filter.action !== undefined && filter.action !== '') {
    clauses.push('action = ?');
    params.push(filter.action);
  }
  if (filter.result !== undefined && filter.result !== '') {
    clauses.push('result = ?');
    params.push(filter.result);
  }

  return {
    where: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '',
    params,
  };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function toAuditRecordJson(record: AuditRecord): AuditRecordJson {
  return {
    id: record.id,
    timestamp: formatRfc3339(record.timestamp),
    event_type: record.eventType,
    identity_id: record.identityId,
    username: record.username,
    resource: record.resource,
    resource_id: record.resourceId,
    action: record.action,
    result: record.result,
    message: record.message,
    client_ip: record.clientIp,
    metadata: { ...record.metadata },
  };
}
