/**
 * xferctl Kernel — Log Sink Interface
 *
 * Runtime-host operations report progress through this interface instead of
 * writing to a stream. The CLI injects its chalk-backed Logger; library
 * callers and tests get NOOP_LOG_SINK.
 *
 * Sinks receive messages that are already free of credentials.
 */

export interface LogSink {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export const NOOP_LOG_SINK: LogSink = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
