/**
 * Write destination for serialized log records.
 * @module
 */

export type LogSinkKind = "console" | "file" | "memory";

export interface LogSink {
  readonly kind: LogSinkKind;
  /** True when writes are held in memory until `flush()`. */
  readonly buffered: boolean;
  /** Write every byte of `chunk` or throw. */
  write(chunk: Uint8Array): void;
  flush(): void;
  close(): void;
}
