import { hostname as osHostname } from "node:os";
import {
  errorMessage,
  LoggerClosedError,
  SerializationError,
  ShutdownError,
  SinkWriteError,
} from "../errors.js";
import type { LogSink } from "../interfaces/log-sink.js";
import type { LogError, LogFields, Logger } from "../interfaces/logger.js";
import { formatBunyanTime } from "../utils/bunyan-time.js";
import { BufferedSink } from "./buffered-sink.js";
import { ConsoleSink } from "./console-sink.js";
import { resolveSink } from "./sink-resolver.js";

export enum LogLevel {
  TRACE = 10,
  DEBUG = 20,
  INFO = 30,
  WARN = 40,
  ERROR = 50,
  FATAL = 60,
}

/** Value of the bunyan `v` field. */
export const BUNYAN_SYNTAX_VERSION = 0;

const LEVELS_BY_NAME = new Map<string, LogLevel>([
  ["fatal", LogLevel.FATAL],
  ["error", LogLevel.ERROR],
  ["warn", LogLevel.WARN],
  ["info", LogLevel.INFO],
  ["debug", LogLevel.DEBUG],
]);

/**
 * Map a lowercase level name to its LogLevel.
 * Anything unrecognized (including `undefined` and `"trace"`) yields TRACE.
 */
export function parseLogLevel(name?: string): LogLevel {
  if (name === undefined) return LogLevel.TRACE;
  return LEVELS_BY_NAME.get(name) ?? LogLevel.TRACE;
}

/** Which sink receives writes. Leaving `primary` is permanent. */
export type SinkState =
  | { readonly kind: "primary" }
  | { readonly kind: "degraded-to-console"; readonly cause: SinkWriteError };

export interface StructuredLoggerOptions {
  name: string;
  /** Primary destination. Defaults to stdout. */
  sink?: LogSink;
  /** Where writes go after the primary sink fails. Defaults to stdout. */
  fallbackSink?: LogSink;
  level?: LogLevel;
  now?: () => Date;
}

/** Flush and close failures, reported independently. */
export interface CloseResult {
  flushError?: ShutdownError;
  closeError?: ShutdownError;
}

function resolveHostname(): string {
  try {
    return osHostname();
  } catch {
    return "";
  }
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

function toJsonValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { message: value.message, name: value.name, stack: value.stack };
  }
  return value;
}

/**
 * Serialize a record as single-line JSON with keys in lexicographic order.
 * Fields whose value has no JSON form (undefined, functions) are dropped.
 * Throws whatever JSON.stringify throws (BigInt, circular structures).
 */
export function serializeRecord(record: ReadonlyMap<string, unknown>): string {
  const parts: string[] = [];
  for (const key of [...record.keys()].sort(compareKeys)) {
    const json: string | undefined = JSON.stringify(toJsonValue(record.get(key)));
    if (json === undefined) continue;
    parts.push(`${JSON.stringify(key)}:${json}`);
  }
  return `{${parts.join(",")}}`;
}

/**
 * Bunyan-format JSON line logger writing to a single sink.
 *
 * Logging calls never throw: failures come back as the return value. A failed
 * write moves the logger permanently onto its fallback (console) sink and
 * reports the failure there as an ERROR record.
 */
export class StructuredLogger implements Logger {
  readonly name: string;
  readonly hostname: string;
  readonly pid: number;

  private readonly sink: LogSink;
  private readonly fallbackSink: LogSink;
  private readonly now: () => Date;
  private activeSink: LogSink;
  private threshold: LogLevel;
  private state: SinkState = { kind: "primary" };
  private isClosed = false;

  // Write section: records emitted while a write is in progress wait here.
  private writing = false;
  private readonly queued: Uint8Array[] = [];

  constructor(options: StructuredLoggerOptions) {
    this.name = options.name.trim();
    this.hostname = resolveHostname();
    this.pid = process.pid;
    this.sink = options.sink ?? new ConsoleSink();
    this.fallbackSink = options.fallbackSink ?? new ConsoleSink();
    this.activeSink = this.sink;
    this.threshold = options.level ?? LogLevel.TRACE;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Console logger, or append-mode file logger when `destinationPath` is given.
   * Throws ConstructionError when the file or its directories cannot be created.
   */
  static create(name: string, destinationPath?: string): StructuredLogger {
    return new StructuredLogger({ name, sink: resolveSink(destinationPath) });
  }

  /** Like `create`, with writes held in a `bufferSize`-byte buffer until full or closed. */
  static createBuffered(
    name: string,
    bufferSize: number,
    destinationPath?: string,
  ): StructuredLogger {
    const sink = new BufferedSink(resolveSink(destinationPath), bufferSize);
    return new StructuredLogger({ name, sink });
  }

  get level(): LogLevel {
    return this.threshold;
  }

  get buffered(): boolean {
    return this.sink.buffered;
  }

  get sinkState(): SinkState {
    return this.state;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Set the threshold by name. Unknown names silently reset it to TRACE. */
  setLevel(levelName?: string): void {
    this.threshold = parseLogLevel(levelName);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.threshold;
  }

  trace(msg: string, ...extras: LogFields[]): LogError | undefined {
    return this.logAt(LogLevel.TRACE, msg, extras);
  }

  debug(msg: string, ...extras: LogFields[]): LogError | undefined {
    return this.logAt(LogLevel.DEBUG, msg, extras);
  }

  info(msg: string, ...extras: LogFields[]): LogError | undefined {
    return this.logAt(LogLevel.INFO, msg, extras);
  }

  warn(msg: string, ...extras: LogFields[]): LogError | undefined {
    return this.logAt(LogLevel.WARN, msg, extras);
  }

  error(msg: string, ...extras: LogFields[]): LogError | undefined {
    return this.logAt(LogLevel.ERROR, msg, extras);
  }

  fatal(msg: string, ...extras: LogFields[]): LogError | undefined {
    return this.logAt(LogLevel.FATAL, msg, extras);
  }

  /** Write one record at `level` regardless of the threshold. */
  log(msg: string, level: LogLevel, ...extras: LogFields[]): LogError | undefined {
    if (this.isClosed) return new LoggerClosedError(this.name);
    return this.emit(msg, level, extras);
  }

  /**
   * Flush the buffer (if buffered) and close the primary sink (unless it is the console).
   * Both steps run even when the other fails. Closing twice is a no-op.
   */
  close(): CloseResult {
    if (this.isClosed) return {};
    this.isClosed = true;

    const result: CloseResult = {};
    if (this.sink.buffered) {
      try {
        this.sink.flush();
      } catch (err) {
        result.flushError = new ShutdownError(
          `Error flushing log buffer: ${errorMessage(err)}`,
          "flush",
          { cause: err },
        );
      }
    }
    if (this.sink.kind !== "console") {
      try {
        this.sink.close();
      } catch (err) {
        result.closeError = new ShutdownError(
          `Error closing log sink: ${errorMessage(err)}`,
          "close",
          { cause: err },
        );
      }
    }
    return result;
  }

  private logAt(level: LogLevel, msg: string, extras: LogFields[]): LogError | undefined {
    if (!this.isLevelEnabled(level)) return undefined;
    return this.log(msg, level, ...extras);
  }

  private emit(msg: string, level: LogLevel, extras: LogFields[]): LogError | undefined {
    const record = new Map<string, unknown>([
      ["hostname", this.hostname],
      ["level", level],
      ["msg", msg],
      ["name", this.name],
      ["pid", this.pid],
      ["time", formatBunyanTime(this.now())],
      ["v", BUNYAN_SYNTAX_VERSION],
    ]);
    for (const extra of extras) {
      for (const [key, value] of Object.entries(extra)) record.set(key, value);
    }

    let line: string;
    try {
      line = serializeRecord(record);
    } catch (err) {
      const error = new SerializationError(
        `Error marshalling log entry JSON: ${errorMessage(err)}`,
        { cause: err },
      );
      // Plain text, so the failure still leaves a trace in the sink.
      this.write(Buffer.from(`${error.message}\n`, "utf-8"));
      return error;
    }
    return this.write(Buffer.from(`${line}\n`, "utf-8"));
  }

  private write(bytes: Uint8Array): SinkWriteError | undefined {
    if (this.writing) {
      this.queued.push(bytes);
      return undefined;
    }

    this.writing = true;
    try {
      const error = this.writeToActiveSink(bytes);
      for (let next = this.queued.shift(); next; next = this.queued.shift()) {
        this.writeToActiveSink(next);
      }
      return error;
    } finally {
      this.writing = false;
    }
  }

  private writeToActiveSink(bytes: Uint8Array): SinkWriteError | undefined {
    try {
      this.activeSink.write(bytes);
      return undefined;
    } catch (err) {
      const error = new SinkWriteError(`Error writing to log: ${errorMessage(err)}`, {
        cause: err,
      });
      if (this.state.kind === "primary") this.degradeToConsole(error);
      return error;
    }
  }

  private degradeToConsole(cause: SinkWriteError): void {
    this.state = { kind: "degraded-to-console", cause };
    this.activeSink = this.fallbackSink;
    // Queued behind the current write; drained onto the fallback sink.
    if (this.isLevelEnabled(LogLevel.ERROR)) this.emit(cause.message, LogLevel.ERROR, []);
  }
}
