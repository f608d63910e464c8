/**
 * Role collaborator calls: `GET roles`, `GET roles/<id>`, `POST roles`,
 * `DELETE roles/<id>`.
 */

import { InvalidArgumentError } from '@xferctl/kernel';

import type { ApiClient } from './client.js';
import { isDataList, isObject, isOptionalBoolean, isOptionalString } from './guards.js';

export interface Role {
  readonly id?: string;
  readonly collection?: string;
  readonly principal?: string;
  readonly role?: string;
}

export interface RoleList {
  readonly data: Role[];
  readonly has_next_page?: boolean;
  readonly marker?: string;
}

export interface ListRolesOptions {
  readonly collection?: string | undefined;
  readonly principal?: string | undefined;
  readonly signal?: AbortSignal | undefined;
}

/** Fields left undefined are omitted from the request body. */
export interface CreateRoleRequest {
  readonly collection?: string | undefined;
  readonly principal: string;
  readonly role: string;
}

export function isRole(value: unknown): value is Role {
  return (
    isObject(value) &&
    isOptionalString(value['id']) &&
    isOptionalString(value['collection']) &&
    isOptionalString(value['principal']) &&
    isOptionalString(value['role'])
  );
}

function isRoleList(value: unknown): value is RoleList {
  return (
    isDataList(value, isRole) &&
    isOptionalBoolean(value['has_next_page']) &&
    isOptionalString(value['marker'])
  );
}

function rolePath(roleId: string): string {
  if (roleId === '') {
    throw new InvalidArgumentError('Role id is required.');
  }
  return `roles/${encodeURIComponent(roleId)}`;
}

export async function listRoles(client: ApiClient, options: ListRolesOptions = {}): Promise<RoleList> {
  const query = new URLSearchParams();
  if (options.collection !== undefined && options.collection !== '') {
    query.set('collection', options.collection);
  }
  if (options.principal !== undefined && options.principal !== '') {
    query.set('principal', options.principal);
  }
  const qs = query.toString();
  const response = await client.request('GET', qs === '' ? 'roles' : `roles?${qs}`, {
    signal: options.signal,
  });
  return client.decode(response, isRoleList, 'role list');
}

export async function getRole(client: ApiClient, roleId: string, signal?: AbortSignal): Promise<Role> {
  const response = await client.request('GET', rolePath(roleId), { signal });
  return client.decode(response, isRole, 'role');
}

export async function createRole(
  client: ApiClient,
  role: CreateRoleRequest,
  signal?: AbortSignal,
): Promise<Role> {
  const response = await client.request('POST', 'roles', { body: role, signal });
  return client.decode(response, isRole, 'role');
}

export async function deleteRole(client: ApiClient, roleId: string, signal?: AbortSignal): Promise<void> {
  const response = await client.request('DELETE', rolePath(roleId), { signal });
  client.drain(response);
}
