/**
 * Endpoint introspection: `GET info` (no credential needed) and
 * `GET endpoint`.
 */

import type { ApiClient } from './client.js';
import { isObject, isOptionalBoolean, isOptionalNumber, isOptionalString } from './guards.js';

export interface EndpointInfo {
  readonly api_version: string;
  readonly endpoint_id: string;
  readonly manager_version: string;
}

export interface Endpoint {
  readonly id?: string;
  readonly display_name?: string;
  readonly organization?: string;
  readonly department?: string;
  readonly description?: string;
  readonly contact_email?: string;
  readonly contact_info?: string;
  readonly info_link?: string;
  readonly public?: boolean;
  readonly default_directory?: string;
  readonly keywords?: string[];
  readonly subscription_id?: string;
  readonly network_use?: string;
  readonly max_concurrency?: number;
  readonly preferred_concurrency?: number;
  readonly last_modified?: string;
}

export function isEndpointInfo(value: unknown): value is EndpointInfo {
  return (
    isObject(value) &&
    typeof value['api_version'] === 'string' &&
    typeof value['endpoint_id'] === 'string' &&
    typeof value['manager_version'] === 'string'
  );
}

const ENDPOINT_STRING_FIELDS = [
  'id',
  'display_name',
  'organization',
  'department',
  'description',
  'contact_email',
  'contact_info',
  'info_link',
  'default_directory',
  'subscription_id',
  'network_use',
  'last_modified',
] as const;

export function isEndpoint(value: unknown): value is Endpoint {
  if (!isObject(value)) return false;
  for (const field of ENDPOINT_STRING_FIELDS) {
    if (!isOptionalString(value[field])) return false;
  }
  const keywords = value['keywords'];
  if (keywords !== undefined && !(Array.isArray(keywords) && keywords.every((k) => typeof k === 'string'))) {
    return false;
  }
  return (
    isOptionalBoolean(value['public']) &&
    isOptionalNumber(value['max_concurrency']) &&
    isOptionalNumber(value['preferred_concurrency'])
  );
}

export async function getInfo(client: ApiClient, signal?: AbortSignal): Promise<EndpointInfo> {
  const response = await client.request('GET', 'info', { signal });
  return client.decode(response, isEndpointInfo, 'endpoint info');
}

export async function getEndpoint(client: ApiClient, signal?: AbortSignal): Promise<Endpoint> {
  const response = await client.request('GET', 'endpoint', { signal });
  return client.decode(response, isEndpoint, 'endpoint');
}
