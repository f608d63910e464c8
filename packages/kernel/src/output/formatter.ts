/**
 * xferctl Kernel — Output Formatter
 *
 * Two render strategies behind one interface. Commands call every method
 * unconditionally; the inactive half of each strategy is a no-op, so the
 * structured and text modes never mix on stdout.
 *
 * createFormatter() is the only place that branches on the output mode.
 */

import { format } from 'node:util';

import { InvalidArgumentError } from '../errors/errors.js';

export enum OutputFormat {
  Text = 'text',
  Json = 'json',
}

/** Anything with a write(string) method: process.stdout, a PassThrough, a test buffer. */
export interface TextSink {
  write(chunk: string): unknown;
}

export interface OutputFormatter {
  isStructured(): boolean;
  /** Pretty-printed JSON followed by a newline. No-op in text mode. */
  printStructured(value: unknown): void;
  /** printf-style (`%s`, `%d`, `%j`). No newline is appended. No-op in JSON mode. */
  printText(fmt: string, ...args: unknown[]): void;
  /** Space-joined arguments followed by a newline. No-op in JSON mode. */
  println(...args: unknown[]): void;
}

// ---------------------------------------------------------------------------
// Implementations
// ---------------------------------------------------------------------------

export class JsonFormatter implements OutputFormatter {
  constructor(private readonly sink: TextSink) {}

  isStructured(): boolean {
    return true;
  }

  printStructured(value: unknown): void {
    this.sink.write(`${JSON.stringify(value, null, 2)}\n`);
  }

  printText(_fmt: string, ..._args: unknown[]): void {
    // structured mode
  }

  println(..._args: unknown[]): void {
    // structured mode
  }
}

export class TextFormatter implements OutputFormatter {
  constructor(private readonly sink: TextSink) {}

  isStructured(): boolean {
    return false;
  }

  printStructured(_value: unknown): void {
    // text mode
  }

  printText(fmt: string, ...args: unknown[]): void {
    this.sink.write(format(fmt, ...args));
  }

  println(...args: unknown[]): void {
    this.sink.write(`${args.map((a) => String(a)).join(' ')}\n`);
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Parse a `--format` flag value.
 *
 * @throws {InvalidArgumentError} for anything other than `text` or `json`
 */
export function parseOutputFormat(value: string): OutputFormat {
  switch (value) {
    case OutputFormat.Text:
      return OutputFormat.Text;
    case OutputFormat.Json:
      return OutputFormat.Json;
    default:
      throw new InvalidArgumentError(`Unsupported output format "${value}" (expected text or json).`);
  }
}

export function createFormatter(mode: OutputFormat, sink: TextSink): OutputFormatter {
  return mode === OutputFormat.Json ? new JsonFormatter(sink) : new TextFormatter(sink);
}
