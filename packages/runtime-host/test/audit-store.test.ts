/**
 * xferctl Runtime Host — AuditStore Tests
 *
 *   AS-U1: ingesting the same records twice leaves one row per id
 *   AS-U2: one bad row rolls back the whole run
 *   AS-U3: a cancelled run commits nothing
 *   AS-U4: queries are newest first, filtered and limited
 *   AS-U5: timestamps are normalized to UTC with milliseconds kept
 *
 * Each test opens a fresh database file in its own temp directory.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { existsSync, mkdtempSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CancelledError, IngestionFailedError, LocalStoreError } from '@xferctl/kernel';
import type { RemoteAuditRecord } from '@xferctl/kernel';
import { AuditStore } from '../src/audit/audit-store.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const open: AuditStore[] = [];

function openStore(): AuditStore {
  const dir = mkdtempSync(join(tmpdir(), 'xferctl-audit-'));
  const store = AuditStore.open(join(dir, 'audit', 'audit.db'));
  open.push(store);
  return store;
}

afterEach(() => {
  for (const store of open.splice(0)) {
    store.close();
  }
});

function remote(id: string | null, timestamp: string | null, overrides: Partial<RemoteAuditRecord> = {}): RemoteAuditRecord {
  return {
    id,
    timestamp,
    eventType: 'login',
    identityId: 'user-1',
    username: 'alice',
    resource: 'session',
    resourceId: 's-1',
    action: 'create',
    result: 'success',
    message: 'ok',
    clientIp: '192.0.2.10',
    metadata: {},
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('AuditStore', () => {
  it('creates the database and its directory', () => {
    const store = openStore();
    expect(existsSync(store.path)).toBe(true);
    expect(store.count()).toBe(0);
  });

  it('AS-U1: upserts by id', () => {
    const store = openStore();
    const batch = [remote('e1', '2025-01-01T00:00:00Z'), remote('e2', '2025-01-01T00:01:00Z')];

    expect(store.ingest(batch)).toBe(2);
    expect(store.ingest(batch)).toBe(2);

    expect(store.count()).toBe(2);
  });

  it('AS-U1: a later record with the same id replaces the earlier one', () => {
    const store = openStore();
    store.ingest([remote('e1', '2025-01-01T00:00:00Z', { message: 'first' })]);
    store.ingest([remote('e1', '2025-01-01T00:00:00Z', { message: 'second' })]);

    expect(store.query({}).map((r) => r.message)).toEqual(['second']);
  });

  it('AS-U2: a null timestamp in the fourth of five rows commits nothing', () => {
    const store = openStore();
    const batch = [
      remote('e1', '2025-01-01T00:00:00Z'),
      remote('e2', '2025-01-01T00:01:00Z'),
      remote('e3', '2025-01-01T00:02:00Z'),
      remote('e4', null),
      remote('e5', '2025-01-01T00:04:00Z'),
    ];

    let failure: unknown;
    try {
      store.ingest(batch);
    } catch (err) {
      failure = err;
    }

    expect(failure).toBeInstanceOf(IngestionFailedError);
    expect(failure instanceof IngestionFailedError && failure.rowIndex).toBe(3);
    expect(store.count()).toBe(0);
  });

  it('AS-U2: a failed run leaves earlier runs intact', () => {
    const store = openStore();
    store.ingest([remote('e1', '2025-01-01T00:00:00Z')]);

    expect(() => store.ingest([remote('e2', '2025-01-01T00:01:00Z'), remote(null, '2025-01-01T00:02:00Z')])).toThrow(
      'Audit record 1 has no id.',
    );
    expect(() => store.ingest([remote('e3', 'yesterday')])).toThrow(
      'Audit record e3 has an invalid timestamp "yesterday".',
    );

    expect(store.query({}).map((r) => r.id)).toEqual(['e1']);
  });

  it('AS-U3: an aborted signal rolls back', () => {
    const store = openStore();
    const controller = new AbortController();
    controller.abort();

    expect(() => store.ingest([remote('e1', '2025-01-01T00:00:00Z')], { signal: controller.signal })).toThrow(
      CancelledError,
    );
    expect(store.count()).toBe(0);
  });

  it('AS-U4: returns records newest first', () => {
    const store = openStore();
    store.ingest([
      remote('old', '2025-01-01T00:00:00Z'),
      remote('new', '2025-01-03T00:00:00Z'),
      remote('mid', '2025-01-02T00:00:00Z'),
    ]);

    expect(store.query({}).map((r) => r.id)).toEqual(['new', 'mid', 'old']);
    expect(store.query({}, 2).map((r) => r.id)).toEqual(['new', 'mid']);
  });

  it('AS-U4: applies time and equality filters', () => {
    const store = openStore();
    store.ingest([
      remote('a', '2025-01-01T00:00:00Z', { eventType: 'login', result: 'success' }),
      remote('b', '2025-01-02T00:00:00Z', { eventType: 'login', result: 'failure' }),
      remote('c', '2025-01-03T00:00:00Z', { eventType: 'role.created', identityId: 'user-2', action: 'create' }),
    ]);

    expect(store.query({ eventType: 'login' }).map((r) => r.id)).toEqual(['b', 'a']);
    expect(store.query({ result: 'failure' }).map((r) => r.id)).toEqual(['b']);
    expect(store.query({ identityId: 'user-2', action: 'create' }).map((r) => r.id)).toEqual(['c']);
    expect(
      store
        .query({ startTime: new Date('2025-01-02T00:00:00Z'), endTime: new Date('2025-01-03T00:00:00Z') })
        .map((r) => r.id),
    ).toEqual(['c', 'b']);
  });

  it('AS-U5: normalizes timestamps and keeps metadata', () => {
    const store = openStore();
    store.ingest([remote('e1', '2025-01-01T02:00:00.750+02:00', { metadata: { bytes: '1024' } })]);

    const [record] = store.query({});

    expect(record?.timestamp.toISOString()).toBe('2025-01-01T00:00:00.750Z');
    expect(record?.metadata).toEqual({ bytes: '1024' });
    expect(record?.clientIp).toBe('192.0.2.10');
  });

  it('AS-U5: time bounds compare below one second', () => {
    const store = openStore();
    store.ingest([
      remote('early', '2025-01-01T00:00:00.500Z'),
      remote('late', '2025-01-01T00:00:00.900Z'),
    ]);

    expect(store.query({ startTime: new Date('2025-01-01T00:00:00.700Z') }).map((r) => r.id)).toEqual(['late']);
    expect(store.query({ endTime: new Date('2025-01-01T00:00:00.700Z') }).map((r) => r.id)).toEqual(['early']);
  });

  it('reports an unopenable path as LocalStoreError', () => {
    const dir = mkdtempSync(join(tmpdir(), 'xferctl-audit-'));
    // the database path is an existing directory
    expect(() => AuditStore.open(dir)).toThrow(LocalStoreError);
  });
});
