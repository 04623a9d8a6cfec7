import type { LogSink } from "../interfaces/log-sink.js";

/**
 * In-process LogSink for tests. Records every chunk it receives and can be
 * told to fail writes to exercise the logger's error paths.
 */
export class MemorySink implements LogSink {
  readonly kind = "memory";
  readonly buffered = false;
  readonly chunks: Uint8Array[] = [];
  closed = false;
  private failures: Error[] = [];
  private closeFailure: Error | null = null;
  private onWrite: ((text: string) => void) | null = null;

  write(chunk: Uint8Array): void {
    const failure = this.failures.shift();
    if (failure) throw failure;
    if (this.closed) throw new Error("write after close");
    this.chunks.push(Uint8Array.from(chunk));
    this.onWrite?.(Buffer.from(chunk).toString("utf-8"));
  }

  flush(): void {}

  close(): void {
    if (this.closeFailure) throw this.closeFailure;
    this.closed = true;
  }

  /** Everything written so far, decoded as UTF-8. */
  get text(): string {
    return Buffer.concat(this.chunks).toString("utf-8");
  }

  /** Written text split into lines, without the trailing empty entry. */
  get lines(): string[] {
    return this.text.split("\n").filter((line) => line.length > 0);
  }

  /** Make the next write throw `error` instead of recording. */
  failNextWrite(error: Error): void {
    this.failures.push(error);
  }

  failClose(error: Error): void {
    this.closeFailure = error;
  }

  /** Run `listener` after each successful write with the chunk's text. */
  onWritten(listener: (text: string) => void): void {
    this.onWrite = listener;
  }
}
