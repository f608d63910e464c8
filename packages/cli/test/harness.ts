/**
 * In-memory runtime for driving the command tree: captured stdout and
 * stderr, recorded exit codes, a fixed clock and a fake HTTPS transport.
 */

import { mkdtempSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Readable, Writable } from 'node:stream';
import type { Env, HttpRequest, HttpResponse, HttpTransport } from '@xferctl/runtime-host';

import type { CliRuntime } from '../src/context.js';

export const NOW = new Date('2025-06-01T12:00:00Z');

const ANSI = /\u001b\[[0-9;]*m/g;

export interface Reply {
  readonly status: number;
  readonly body: string;
}

export class StubTransport implements HttpTransport {
  readonly requests: Array<{ method: string; url: string; body: string | undefined }> = [];

  constructor(private readonly reply: (request: HttpRequest) => Reply = () => ({ status: 200, body: '{}' })) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push({ method: request.method, url: request.url.href, body: request.body });
    const { status, body } = this.reply(request);
    return { status, headers: {}, text: async () => body, release: () => undefined };
  }

  close(): void {
    // nothing pooled
  }
}

export function json(value: unknown, status = 200): Reply {
  return { status, body: JSON.stringify(value) };
}

function capture(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('').replace(ANSI, '') };
}

export interface Harness {
  readonly env: Env & { configRoot: string };
  readonly runtime: CliRuntime;
  readonly exitCodes: number[];
  stdout(): string;
  stderr(): string;
}

export function harness(options: { transport?: HttpTransport; stdin?: string[] } = {}): Harness {
  const env = { configRoot: mkdtempSync(join(tmpdir(), 'xferctl-cli-')) };
  const out = capture();
  const err = capture();
  const exitCodes: number[] = [];
  const runtime: CliRuntime = {
    env,
    stdout: out.stream,
    stderr: err.stream,
    stdin: Readable.from(options.stdin ?? []),
    setExitCode: (code) => {
      exitCodes.push(code);
    },
    now: () => NOW,
    transport: options.transport,
  };
  return { env, runtime, exitCodes, stdout: out.text, stderr: err.text };
}
