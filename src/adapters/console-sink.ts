import type { LogSink } from "../interfaces/log-sink.js";

/** Minimal stream surface the console sink writes to. */
export interface ConsoleStream {
  write(chunk: Uint8Array, callback: (err?: Error | null) => void): unknown;
}

/**
 * Console-backed LogSink. Defaults to stdout.
 * Closing is a no-op: the process owns the stream.
 *
 * Stream writes fail asynchronously, so a failure reported through the write
 * callback is thrown from the next `write`. The stream's `error` event stays
 * the concern of whoever owns the stream.
 */
export class ConsoleSink implements LogSink {
  readonly kind = "console";
  readonly buffered = false;
  private readonly stream: ConsoleStream;
  private pendingError: Error | null = null;

  constructor(stream: ConsoleStream = process.stdout) {
    this.stream = stream;
  }

  write(chunk: Uint8Array): void {
    const failed = this.pendingError;
    if (failed) {
      this.pendingError = null;
      throw failed;
    }
    this.stream.write(chunk, (err) => {
      if (err) this.pendingError = err;
    });
  }

  flush(): void {}

  close(): void {}
}
