/**
 * Logger — diagnostics on stderr.
 *
 * Command results go to stdout through the OutputFormatter; everything
 * else (progress, warnings, errors) comes through here so that
 * `--format json` output stays machine-readable.
 *
 *   debug  only with --debug
 *   info   with --verbose or --debug
 *   warn   always
 *   error  always
 */

import type { LogSink } from '@xferctl/kernel';

import { t } from './theme.js';

export interface LoggerOptions {
  readonly verbose: boolean;
  readonly debug: boolean;
}

export class Logger implements LogSink {
  constructor(
    private readonly stream: NodeJS.WritableStream,
    private readonly options: LoggerOptions,
  ) {}

  debug(message: string): void {
    if (this.options.debug) {
      this.stream.write(t.muted(`debug: ${message}`) + '\n');
    }
  }

  info(message: string): void {
    if (this.options.verbose || this.options.debug) {
      this.stream.write(t.blue(message) + '\n');
    }
  }

  warn(message: string): void {
    this.stream.write(t.amber(`warning: ${message}`) + '\n');
  }

  error(message: string): void {
    this.stream.write(t.red(message) + '\n');
  }
}
