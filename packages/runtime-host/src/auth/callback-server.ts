/**
 * xferctl Runtime Host — Loopback Callback Server
 *
 * Receives the authorization redirect during `xferctl login`. The request
 * handler and the waiting login flow share nothing but two single-slot
 * channels: one for the code, one for the error. The first value offered
 * to either channel decides the outcome; later requests get a response but
 * cannot change it.
 *
 * The wait ends at whichever comes first:
 *   - a code                      → resolved
 *   - a rejected callback         → ProtocolError (400 sent to the browser)
 *   - the deadline (5 minutes)    → TimeoutError
 *   - the caller's signal         → CancelledError
 *
 * On every path the listener is closed, giving in-flight connections up to
 * 5 seconds before they are cut.
 */

import { createServer } from 'node:http';
import type { Server, ServerResponse } from 'node:http';

import {
  CancelledError,
  ProtocolError,
  TimeoutError,
  TransportError,
  isNodeError,
} from '@xferctl/kernel';
import type { XferError } from '@xferctl/kernel';

export const CALLBACK_HOST = 'localhost';
export const CALLBACK_PORT = 8080;
export const CALLBACK_PATH = '/callback';
export const CALLBACK_DEADLINE_MS = 5 * 60 * 1000;
export const SHUTDOWN_DRAIN_MS = 5_000;

/** Names the same host the listener binds, so the browser redirect reaches it. */
export function redirectUriFor(port: number, path: string = CALLBACK_PATH): string {
  return `http://${CALLBACK_HOST}:${port}${path}`;
}

const SUCCESS_PAGE = `<!DOCTYPE html>
<html>
<head><title>xferctl login</title></head>
<body>
<h1>Authentication successful</h1>
<p>You can close this window and return to the terminal.</p>
</body>
</html>
`;

// ---------------------------------------------------------------------------
// Single-slot channel
// ---------------------------------------------------------------------------

/** Holds at most one value. offer() after the first is ignored. */
export class SingleSlot<T> {
  private slot: { readonly value: T } | undefined;
  private readonly waiters: Array<(value: T) => void> = [];

  offer(value: T): boolean {
    if (this.slot !== undefined) {
      return false;
    }
    this.slot = { value };
    for (const waiter of this.waiters.splice(0)) {
      waiter(value);
    }
    return true;
  }

  take(): Promise<T> {
    const slot = this.slot;
    if (slot !== undefined) {
      return Promise.resolve(slot.value);
    }
    return new Promise<T>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

export interface WaitForCallbackOptions {
  readonly expectedState: string;
  /** Default 8080; 0 picks a free port (see onListening). */
  readonly port?: number | undefined;
  readonly path?: string | undefined;
  readonly signal?: AbortSignal | undefined;
  readonly deadlineMs?: number | undefined;
  readonly drainMs?: number | undefined;
  /** Called once the listener is bound, with the actual port. */
  readonly onListening?: ((port: number) => void) | undefined;
}

function reply(res: ServerResponse, status: number, contentType: string, body: string): void {
  res.writeHead(status, { 'Content-Type': contentType, Connection: 'close' });
  res.end(body);
}

function listen(server: Server, port: number): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const onError = (err: Error): void => {
      reject(new TransportError(`Cannot listen on ${CALLBACK_HOST}:${port}: ${err.message}`, { cause: err }));
    };
    server.once('error', onError);
    server.listen(port, CALLBACK_HOST, () => {
      server.off('error', onError);
      const address = server.address();
      resolve(address !== null && typeof address === 'object' ? address.port : port);
    });
  });
}

function shutdown(server: Server, drainMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => server.closeAllConnections(), drainMs);
    server.close((err) => {
      clearTimeout(timer);
      if (err !== undefined && !isNodeError(err, 'ERR_SERVER_NOT_RUNNING')) {
        reject(err);
        return;
      }
      resolve();
    });
    server.closeIdleConnections();
  });
}

/**
 * Serve the callback path on localhost until a code arrives, and return it.
 */
export async function waitForCallback(options: WaitForCallbackOptions): Promise<string> {
  const path = options.path ?? CALLBACK_PATH;
  const deadlineMs = options.deadlineMs ?? CALLBACK_DEADLINE_MS;
  const codes = new SingleSlot<string>();
  const errors = new SingleSlot<XferError>();

  if (options.signal?.aborted === true) {
    throw new CancelledError('Login cancelled.');
  }

  const server = createServer((req, res) => {
    const url = new URL(req.url ?? '/', `http://${CALLBACK_HOST}`);
    if (url.pathname !== path) {
      reply(res, 404, 'text/plain; charset=utf-8', 'Not found\n');
      return;
    }

    const state = url.searchParams.get('state');
    const code = url.searchParams.get('code');
    const denied = url.searchParams.get('error');

    if (state !== options.expectedState) {
      reply(res, 400, 'text/plain; charset=utf-8', 'Invalid state parameter\n');
      errors.offer(new ProtocolError('Invalid state parameter in callback (possible CSRF attack); login aborted.'));
      return;
    }
    if (denied !== null && denied !== '') {
      reply(res, 400, 'text/plain; charset=utf-8', 'Authorization was not granted\n');
      errors.offer(new ProtocolError(`Authorization was not granted: ${denied}.`));
      return;
    }
    if (code === null || code === '') {
      reply(res, 400, 'text/plain; charset=utf-8', 'Missing authorization code\n');
      errors.offer(new ProtocolError('No authorization code in callback.'));
      return;
    }

    reply(res, 200, 'text/html; charset=utf-8', SUCCESS_PAGE);
    codes.offer(code);
  });

  const port = await listen(server, options.port ?? CALLBACK_PORT);
  options.onListening?.(port);

  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;
  try {
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TimeoutError(`No authorization callback within ${Math.round(deadlineMs / 1000)} s.`)),
        deadlineMs,
      );
    });
    const cancelled = new Promise<never>((_, reject) => {
      onAbort = () => reject(new CancelledError('Login cancelled.'));
      options.signal?.addEventListener('abort', onAbort, { once: true });
    });
    const failed = errors.take().then((err): never => {
      throw err;
    });
    return await Promise.race([codes.take(), failed, deadline, cancelled]);
  } finally {
    clearTimeout(timer);
    if (onAbort !== undefined) {
      options.signal?.removeEventListener('abort', onAbort);
    }
    await shutdown(server, options.drainMs ?? SHUTDOWN_DRAIN_MS);
  }
}
