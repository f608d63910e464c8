/**
 * xferctl CLI — audit Tests
 *
 *   CLI-B1: `audit dump --format csv` writes the header and one quoted line per record
 *   CLI-B1: event-type and start-time filters combine on a CSV dump
 *   CLI-B2: `audit query` renders a table, an empty notice, or JSON
 *   CLI-B3: bad time and limit flags fail with InvalidArgument before any work
 *   CLI-B4: `audit load` pulls a page through the transport into the store
 */

import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { AuditStore, TokenStore, auditDbPath } from '@xferctl/runtime-host';
import type { Env } from '@xferctl/runtime-host';
import type { RemoteAuditRecord } from '@xferctl/kernel';

import { runProgram } from '../src/commands/index.js';
import { StubTransport, harness, json } from './harness.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function remote(id: string, timestamp: string, overrides: Partial<RemoteAuditRecord> = {}): RemoteAuditRecord {
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

function seed(env: Env, records: RemoteAuditRecord[]): void {
  const store = AuditStore.open(auditDbPath(env));
  try {
    store.ingest(records);
  } finally {
    store.close();
  }
}

const TWO_RECORDS = [
  remote('e1', '2025-05-01T08:00:00Z', { message: 'plain' }),
  remote('e2', '2025-05-02T09:00:00Z', { eventType: 'role.deleted', result: 'failure', message: 'has "quotes", and commas' }),
];

/** One transfer at midnight and one access at 06:00 on every day of January 2025. */
function january(): RemoteAuditRecord[] {
  const records: RemoteAuditRecord[] = [];
  for (let day = 1; day <= 31; day++) {
    const dd = String(day).padStart(2, '0');
    records.push(remote(`t-${dd}`, `2025-01-${dd}T00:00:00Z`, { eventType: 'transfer' }));
    records.push(remote(`a-${dd}`, `2025-01-${dd}T06:00:00Z`, { eventType: 'access' }));
  }
  return records;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('audit dump', () => {
  it('CLI-B1: exports CSV', async () => {
    const h = harness();
    seed(h.env, TWO_RECORDS);
    const file = join(h.env.configRoot, 'out.csv');

    await runProgram(h.runtime, ['audit', 'dump', '-o', file, '--format', 'csv']);

    expect(h.exitCodes).toEqual([]);
    expect(h.stdout()).toBe(`Exported 2 audit record(s) to ${file}\n`);
    expect(readFileSync(file, 'utf-8')).toBe(
      'id,timestamp,event_type,actor_id,username,resource,resource_id,action,result,message,client_ip\n' +
        'e2,2025-05-02T09:00:00Z,role.deleted,user-1,alice,session,s-1,create,failure,"has ""quotes"", and commas",192.0.2.10\n' +
        'e1,2025-05-01T08:00:00Z,login,user-1,alice,session,s-1,create,success,plain,192.0.2.10\n',
    );
  });

  it('CLI-B1: combines event-type and start-time filters', async () => {
    const h = harness();
    seed(h.env, january());
    const file = join(h.env.configRoot, 'transfers.csv');

    await runProgram(h.runtime, [
      'audit', 'dump', '-o', file, '--format', 'csv',
      '--event-type', 'transfer', '--start-time', '2025-01-10T00:00:00Z',
    ]);

    expect(h.exitCodes).toEqual([]);
    expect(h.stdout()).toBe(`Exported 22 audit record(s) to ${file}\n`);
    const lines = readFileSync(file, 'utf-8').split('\n');
    expect(lines[0]).toBe('id,timestamp,event_type,actor_id,username,resource,resource_id,action,result,message,client_ip');
    expect(lines.at(-1)).toBe('');
    const rows = lines.slice(1, -1).map((line) => line.split(','));
    expect(rows).toHaveLength(22);
    for (const row of rows) {
      expect(row[2]).toBe('transfer');
      expect((row[1] ?? '') >= '2025-01-10T00:00:00Z').toBe(true);
    }
    expect(rows[0]?.[0]).toBe('t-31');
    expect(rows[21]?.[0]).toBe('t-10');
  });

  it('exports filtered JSON by default', async () => {
    const h = harness();
    seed(h.env, TWO_RECORDS);
    const file = join(h.env.configRoot, 'out.json');

    await runProgram(h.runtime, ['audit', 'dump', '-o', file, '--result', 'success']);

    const exported: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    expect(Array.isArray(exported) && exported.map((r: { id: string }) => r.id)).toEqual(['e1']);
  });

  it('rejects an unknown export format', async () => {
    const h = harness();
    const file = join(h.env.configRoot, 'out.xml');

    await runProgram(h.runtime, ['audit', 'dump', '-o', file, '--format', 'xml']);

    expect(h.exitCodes).toEqual([2]);
    expect(h.stderr()).toBe('[InvalidArgument] Unsupported export format "xml" (expected json or csv).\n');
    expect(existsSync(file)).toBe(false);
  });
});

describe('audit query', () => {
  it('CLI-B2: says so when nothing matches', async () => {
    const h = harness();

    await runProgram(h.runtime, ['audit', 'query']);

    expect(h.stdout()).toBe('No audit records found.\n');
  });

  it('CLI-B2: renders a table, newest first', async () => {
    const h = harness();
    seed(h.env, TWO_RECORDS);

    await runProgram(h.runtime, ['audit', 'query']);

    expect(h.stdout().split('\n')).toEqual([
      `${'TIMESTAMP'.padEnd(20)}  ${'EVENT'.padEnd(16)}  ${'USER'.padEnd(20)}  ${'RESULT'.padEnd(8)}  MESSAGE`,
      `2025-05-02T09:00:00Z  ${'role.deleted'.padEnd(16)}  ${'alice'.padEnd(20)}  failure   has "quotes", and commas`,
      `2025-05-01T08:00:00Z  ${'login'.padEnd(16)}  ${'alice'.padEnd(20)}  success   plain`,
      '',
      '2 record(s)',
      '',
    ]);
  });

  it('CLI-B2: emits JSON records and honours filters', async () => {
    const h = harness();
    seed(h.env, TWO_RECORDS);

    await runProgram(h.runtime, ['audit', 'query', '--event-type', 'login', '--format', 'json']);

    const rows: unknown = JSON.parse(h.stdout());
    expect(rows).toEqual([
      {
        id: 'e1',
        timestamp: '2025-05-01T08:00:00Z',
        event_type: 'login',
        identity_id: 'user-1',
        username: 'alice',
        resource: 'session',
        resource_id: 's-1',
        action: 'create',
        result: 'success',
        message: 'plain',
        client_ip: '192.0.2.10',
        metadata: {},
      },
    ]);
  });

  it('CLI-B3: rejects a malformed time flag', async () => {
    const h = harness();

    await runProgram(h.runtime, ['audit', 'query', '--start-time', 'yesterday']);

    expect(h.exitCodes).toEqual([2]);
    expect(h.stderr()).toBe(
      '[InvalidArgument] Invalid --start-time "yesterday": expected RFC 3339, e.g. 2025-01-01T00:00:00Z.\n',
    );
  });

  it('CLI-B3: rejects a non-numeric limit', async () => {
    const h = harness();

    await runProgram(h.runtime, ['audit', 'query', '--limit', '10x']);

    expect(h.exitCodes).toEqual([2]);
    expect(h.stderr()).toBe('[InvalidArgument] Invalid --limit "10x": expected a positive integer.\n');
  });
});

describe('audit load', () => {
  it('CLI-B4: ingests a page from the endpoint', async () => {
    const transport = new StubTransport(() =>
      json({ data: [{ id: 'e9', timestamp: '2025-05-03T00:00:00Z', event_type: 'login' }] }),
    );
    const h = harness({ transport });
    new TokenStore(h.env).save('default', {
      accessCredential: 'test-access',
      expiresAt: new Date('2025-06-01T13:00:00Z'),
      scopes: [],
      resourceServer: '',
    });

    await runProgram(h.runtime, ['audit', 'load', '--endpoint', 'api.example.test', '--limit', '25']);

    expect(h.exitCodes).toEqual([]);
    expect(transport.requests.map((r) => r.url)).toEqual(['https://api.example.test/api/audit-logs?limit=25']);
    expect(h.stdout()).toBe(`Loaded 1 audit record(s) into ${auditDbPath(h.env)}\n`);
  });

  it('fails with NotAuthenticated before any request', async () => {
    const transport = new StubTransport();
    const h = harness({ transport });

    await runProgram(h.runtime, ['audit', 'load', '--endpoint', 'api.example.test']);

    expect(h.exitCodes).toEqual([3]);
    expect(transport.requests).toHaveLength(0);
  });

  it('reports a row without a timestamp as IngestionFailed', async () => {
    const transport = new StubTransport(() =>
      json({ data: [{ id: 'a', timestamp: '2025-05-03T00:00:00Z' }, { id: 'b', timestamp: null }] }),
    );
    const h = harness({ transport });
    new TokenStore(h.env).save('default', {
      accessCredential: 'test-access',
      expiresAt: new Date('2025-06-01T13:00:00Z'),
      scopes: [],
      resourceServer: '',
    });

    await runProgram(h.runtime, ['audit', 'load', '--endpoint', 'api.example.test']);

    expect(h.exitCodes).toEqual([10]);
    expect(h.stderr()).toBe('[IngestionFailed] Audit record b has no timestamp.\n');
  });
});
