/**
 * Command context — what every action receives, and the wrapper that turns
 * thrown errors into `[<Kind>] <message>` on stderr plus the kind's exit code.
 */

import type { Command } from 'commander';

import {
  InvalidArgumentError,
  createFormatter,
  customTlsProfile,
  exitCodeFor,
  isXferError,
  parseOutputFormat,
  requireValidToken,
} from '@xferctl/kernel';
import type { OutputFormatter, TlsProfile } from '@xferctl/kernel';
import { ApiClient, TokenStore } from '@xferctl/runtime-host';
import type { Env, HttpTransport } from '@xferctl/runtime-host';

import { Logger } from './logger.js';

export interface CliRuntime {
  readonly env: Env;
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;
  readonly stdin: NodeJS.ReadableStream;
  setExitCode(code: number): void;
  /** Operator cancellation (SIGINT in the real binary). */
  readonly signal?: AbortSignal | undefined;
  readonly now?: (() => Date) | undefined;
  /** Replaces the HTTPS transport for API and identity provider calls. */
  readonly transport?: HttpTransport | undefined;
}

export interface GlobalOptions {
  verbose?: boolean;
  debug?: boolean;
}

export interface CommandContext {
  readonly runtime: CliRuntime;
  readonly log: Logger;
  readonly signal: AbortSignal | undefined;
  now(): Date;
}

export function reportError(err: unknown, log: Logger): void {
  if (isXferError(err)) {
    log.error(`[${err.kind}] ${err.message}`);
    log.debug(err.stack ?? err.message);
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  log.error(`[Error] ${message}`);
  if (err instanceof Error) {
    log.debug(err.stack ?? message);
  }
}

/**
 * Run a command action. Any thrown value is reported and mapped to an exit
 * code; nothing propagates to commander.
 */
export async function runCommand(
  runtime: CliRuntime,
  command: Command,
  work: (ctx: CommandContext) => Promise<void> | void,
): Promise<void> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const log = new Logger(runtime.stderr, {
    verbose: globals.verbose === true,
    debug: globals.debug === true,
  });
  const ctx: CommandContext = {
    runtime,
    log,
    signal: runtime.signal,
    now: runtime.now ?? (() => new Date()),
  };
  try {
    await work(ctx);
  } catch (err) {
    reportError(err, log);
    runtime.setExitCode(exitCodeFor(err));
  }
}

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

export function formatterFor(ctx: CommandContext, format: string): OutputFormatter {
  return createFormatter(parseOutputFormat(format), ctx.runtime.stdout);
}

export interface EndpointFlags {
  endpoint: string;
  profile: string;
  insecure?: boolean;
}

/** TLS profile for `--insecure`, or undefined for the default profile. */
export function tlsProfileFor(ctx: CommandContext, flags: EndpointFlags): TlsProfile | undefined {
  if (flags.insecure !== true) {
    return undefined;
  }
  ctx.log.warn('certificate verification is disabled (--insecure)');
  return customTlsProfile({ insecureSkipVerify: true });
}

/**
 * ApiClient for `--endpoint`. With `authenticated`, the profile's bundle
 * must exist and be valid.
 */
export function endpointClient(ctx: CommandContext, flags: EndpointFlags, authenticated = true): ApiClient {
  let accessToken: string | undefined;
  if (authenticated) {
    const bundle = new TokenStore(ctx.runtime.env, ctx.log).load(flags.profile);
    requireValidToken(bundle, ctx.now());
    accessToken = bundle.accessCredential;
  }
  return new ApiClient({
    hostname: flags.endpoint,
    accessToken,
    transport: ctx.runtime.transport,
    tlsProfile: tlsProfileFor(ctx, flags),
    allowInsecure: flags.insecure === true,
    log: ctx.log,
  });
}

/** Parse a positive integer flag value. */
export function parseLimit(value: string, flag: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidArgumentError(`Invalid ${flag} "${value}": expected a positive integer.`);
  }
  return n;
}
