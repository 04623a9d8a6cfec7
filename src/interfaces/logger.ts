/**
 * Six-level structured logger interface.
 * StructuredLogger implements this; components that log program to it.
 * @module
 */

import type { LoggerClosedError, SerializationError, SinkWriteError } from "../errors.js";

/** Caller-supplied fields merged into a record. Later mappings win on key collision. */
export type LogFields = Record<string, unknown>;

/** Failure returned (never thrown) by a logging call. */
export type LogError = SerializationError | SinkWriteError | LoggerClosedError;

export interface Logger {
  trace(msg: string, ...extras: LogFields[]): LogError | undefined;
  debug(msg: string, ...extras: LogFields[]): LogError | undefined;
  info(msg: string, ...extras: LogFields[]): LogError | undefined;
  warn(msg: string, ...extras: LogFields[]): LogError | undefined;
  error(msg: string, ...extras: LogFields[]): LogError | undefined;
  fatal(msg: string, ...extras: LogFields[]): LogError | undefined;
}
