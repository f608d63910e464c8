/**
 * `GET audit-logs` — one page of remote audit records.
 *
 * The wire form uses snake_case keys. `id` and `timestamp` may be missing
 * or null; such records are decoded with null values and rejected later by
 * the ingestor, so that the whole run rolls back. Any other field of the
 * wrong type is a ProtocolError.
 */

import { ProtocolError, formatRfc3339 } from '@xferctl/kernel';
import type { RemoteAuditRecord } from '@xferctl/kernel';

import type { ApiClient } from './client.js';
import { isDataList, isObject } from './guards.js';
import type { JsonObject } from './guards.js';

export interface AuditQueryParams {
  readonly startTime?: Date | undefined;
  readonly endTime?: Date | undefined;
  readonly eventType?: string | undefined;
  readonly identityId?: string | undefined;
  readonly resourceId?: string | undefined;
  readonly action?: string | undefined;
  readonly result?: string | undefined;
  /** Sent only when positive. */
  readonly limit?: number | undefined;
}

const TEXT_FIELDS = [
  ['event_type', 'eventType'],
  ['identity_id', 'identityId'],
  ['username', 'username'],
  ['resource', 'resource'],
  ['resource_id', 'resourceId'],
  ['action', 'action'],
  ['result', 'result'],
  ['message', 'message'],
  ['client_ip', 'clientIp'],
] as const;

export function auditLogsPath(params: AuditQueryParams): string {
  const query = new URLSearchParams();
  if (params.startTime !== undefined) query.set('start_time', formatRfc3339(params.startTime));
  if (params.endTime !== undefined) query.set('end_time', formatRfc3339(params.endTime));
  if (params.eventType) query.set('event_type', params.eventType);
  if (params.identityId) query.set('identity_id', params.identityId);
  if (params.resourceId) query.set('resource_id', params.resourceId);
  if (params.action) query.set('action', params.action);
  if (params.result) query.set('result', params.result);
  if (params.limit !== undefined && params.limit > 0) query.set('limit', String(params.limit));
  const qs = query.toString();
  return qs === '' ? 'audit-logs' : `audit-logs?${qs}`;
}

function nullableString(raw: JsonObject, key: string, index: number): string | null {
  const value = raw[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    throw new ProtocolError(`Audit record ${index}: "${key}" must be a string.`);
  }
  return value;
}

function decodeMetadata(raw: JsonObject, index: number): Record<string, string> {
  const value = raw['metadata'];
  if (value === undefined || value === null) return {};
  if (!isObject(value)) {
    throw new ProtocolError(`Audit record ${index}: "metadata" must be an object.`);
  }
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new ProtocolError(`Audit record ${index}: metadata "${key}" must be a string.`);
    }
    out[key] = entry;
  }
  return out;
}

export function decodeAuditRecord(raw: JsonObject, index: number): RemoteAuditRecord {
  const text: Record<(typeof TEXT_FIELDS)[number][1], string> = {
    eventType: '',
    identityId: '',
    username: '',
    resource: '',
    resourceId: '',
    action: '',
    result: '',
    message: '',
    clientIp: '',
  };
  for (const [wire, field] of TEXT_FIELDS) {
    text[field] = nullableString(raw, wire, index) ?? '';
  }
  return {
    id: nullableString(raw, 'id', index),
    timestamp: nullableString(raw, 'timestamp', index),
    ...text,
    metadata: decodeMetadata(raw, index),
  };
}

export async function getAuditLogs(
  client: ApiClient,
  params: AuditQueryParams,
  signal?: AbortSignal,
): Promise<RemoteAuditRecord[]> {
  const response = await client.request('GET', auditLogsPath(params), { signal });
  const page = await client.decode(response, (v): v is { data: JsonObject[] } => isDataList(v, isObject), 'audit log page');
  return page.data.map((raw, index) => decodeAuditRecord(raw, index));
}
