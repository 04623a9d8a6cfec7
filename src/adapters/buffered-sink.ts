import type { LogSink, LogSinkKind } from "../interfaces/log-sink.js";

export const DEFAULT_BUFFER_SIZE = 4096;

/**
 * Fixed-size write buffer in front of another sink.
 *
 * Bytes accumulate until the buffer is full, then go to the inner sink in one write.
 * A chunk larger than the whole buffer skips it when nothing is pending.
 * Nothing reaches the inner sink between fills unless `flush()` is called.
 */
export class BufferedSink implements LogSink {
  readonly buffered = true;
  readonly size: number;
  private readonly inner: LogSink;
  private readonly buffer: Buffer;
  private used = 0;

  constructor(inner: LogSink, size: number) {
    this.inner = inner;
    this.size = Number.isInteger(size) && size > 0 ? size : DEFAULT_BUFFER_SIZE;
    this.buffer = Buffer.alloc(this.size);
  }

  get kind(): LogSinkKind {
    return this.inner.kind;
  }

  /** Bytes waiting for the next flush. */
  get pending(): number {
    return this.used;
  }

  private get available(): number {
    return this.size - this.used;
  }

  write(chunk: Uint8Array): void {
    let rest = chunk;
    while (rest.length > this.available) {
      let taken: number;
      if (this.used === 0) {
        this.inner.write(rest);
        taken = rest.length;
      } else {
        taken = this.available;
        this.buffer.set(rest.subarray(0, taken), this.used);
        this.used += taken;
        this.flushBuffer();
      }
      rest = rest.subarray(taken);
    }
    this.buffer.set(rest, this.used);
    this.used += rest.length;
  }

  flush(): void {
    this.flushBuffer();
    this.inner.flush();
  }

  /** Closes the inner sink. Pending bytes are not flushed; call `flush()` first. */
  close(): void {
    this.inner.close();
  }

  private flushBuffer(): void {
    if (this.used === 0) return;
    // Copy: the inner sink may hold on to the chunk after write() returns.
    this.inner.write(Buffer.from(this.buffer.subarray(0, this.used)));
    this.used = 0;
  }
}
