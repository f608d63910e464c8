/**
 * xferctl Runtime Host — Request Execution
 *
 * Shared by ApiClient and IdentityProviderClient so that both report
 * failures through the same error kinds:
 *
 *   HTTP status >= 400           → RemoteError (body read, response released)
 *   operator abort (caller signal) → CancelledError
 *   total-request deadline        → TimeoutError
 *   anything else from the socket → TransportError
 *
 * The deadline covers reading the body as well, so the response returned
 * here classifies failures from text() the same way.
 */

import {
  CancelledError,
  RemoteError,
  TimeoutError,
  TransportError,
  isXferError,
} from '@xferctl/kernel';
import type { XferError } from '@xferctl/kernel';

import type { HttpRequest, HttpResponse, HttpTransport } from './transport.js';

export interface ExecuteOptions {
  /** Prefix for error messages, e.g. `GET roles`. */
  readonly context: string;
  /** Total request deadline; no deadline when undefined. */
  readonly timeoutMs?: number | undefined;
  /** Operator cancellation. */
  readonly signal?: AbortSignal | undefined;
}

function classify(
  err: unknown,
  options: ExecuteOptions,
  deadline: AbortSignal | undefined,
): XferError {
  if (isXferError(err)) {
    return err;
  }
  if (options.signal?.aborted === true) {
    return new CancelledError(`${options.context}: cancelled.`, { cause: err });
  }
  if (deadline?.aborted === true || (err instanceof Error && err.name === 'TimeoutError')) {
    return new TimeoutError(
      `${options.context}: no complete response within ${options.timeoutMs ?? 0} ms.`,
      { cause: err },
    );
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new TransportError(`${options.context}: ${detail}`, { cause: err });
}

export async function execute(
  transport: HttpTransport,
  request: Omit<HttpRequest, 'signal'>,
  options: ExecuteOptions,
): Promise<HttpResponse> {
  if (options.signal?.aborted === true) {
    throw new CancelledError(`${options.context}: cancelled.`);
  }

  const deadline = options.timeoutMs !== undefined ? AbortSignal.timeout(options.timeoutMs) : undefined;
  const signals = [options.signal, deadline].filter((s): s is AbortSignal => s !== undefined);
  const signal = signals.length > 1 ? AbortSignal.any(signals) : signals[0];

  let response: HttpResponse;
  try {
    response = await transport.send({ ...request, ...(signal !== undefined ? { signal } : {}) });
  } catch (err) {
    throw classify(err, options, deadline);
  }

  const guarded: HttpResponse = {
    status: response.status,
    headers: response.headers,
    text: async () => {
      try {
        return await response.text();
      } catch (err) {
        throw classify(err, options, deadline);
      }
    },
    release: () => response.release(),
  };

  if (guarded.status >= 400) {
    let body: string;
    try {
      body = await guarded.text();
    } finally {
      guarded.release();
    }
    throw new RemoteError(guarded.status, body.trim(), options.context);
  }

  return guarded;
}
