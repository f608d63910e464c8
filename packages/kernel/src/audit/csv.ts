/**
 * xferctl Kernel — Delimited Audit Export
 *
 * RFC 4180 encoding: a field is quoted when it contains a comma, a double
 * quote, CR or LF; embedded quotes are doubled. Lines end with `\n`.
 * The metadata bag is not exported.
 */

import type { AuditRecord } from '../types/audit.js';
import { formatRfc3339 } from './query.js';

export const AUDIT_CSV_HEADER: ReadonlyArray<string> = [
  'id',
  'timestamp',
  'event_type',
  'actor_id',
  'username',
  'resource',
  'resource_id',
  'action',
  'result',
  'message',
  'client_ip',
];

function encodeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function encodeCsvRow(fields: ReadonlyArray<string>): string {
  return fields.map(encodeField).join(',');
}

export function auditRecordToCsvFields(record: AuditRecord): string[] {
  return [
    record.id,
    formatRfc3339(record.timestamp),
    record.eventType,
    record.identityId,
    record.username,
    record.resource,
    record.resourceId,
    record.action,
    record.result,
    record.message,
    record.clientIp,
  ];
}

/** Header line plus one line per record, each terminated by `\n`. */
export function auditRecordsToCsv(records: ReadonlyArray<AuditRecord>): string {
  const lines = [encodeCsvRow(AUDIT_CSV_HEADER)];
  for (const record of records) {
    lines.push(encodeCsvRow(auditRecordToCsvFields(record)));
  }
  return `${lines.join('\n')}\n`;
}
