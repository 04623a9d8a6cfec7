import { closeSync, openSync, writeSync } from "node:fs";
import type { LogSink } from "../interfaces/log-sink.js";

/** Permissions for a newly created log file (before umask). */
export const LOG_FILE_MODE = 0o666;

/**
 * Append-only file sink on a raw descriptor.
 * Writes are synchronous so each record lands in one piece before the call returns.
 */
export class FileSink implements LogSink {
  readonly kind = "file";
  readonly buffered = false;
  readonly path: string;
  readonly fd: number;

  constructor(path: string, fd: number) {
    this.path = path;
    this.fd = fd;
  }

  /** Open `path` for append, creating it if absent. Throws the fs error on failure. */
  static open(path: string): FileSink {
    return new FileSink(path, openSync(path, "a", LOG_FILE_MODE));
  }

  write(chunk: Uint8Array): void {
    let offset = 0;
    while (offset < chunk.length) {
      offset += writeSync(this.fd, chunk, offset, chunk.length - offset);
    }
  }

  flush(): void {}

  close(): void {
    closeSync(this.fd);
  }
}
