import { mkdirSync } from "node:fs";
import { ConstructionError, errorMessage } from "../errors.js";
import type { LogSink } from "../interfaces/log-sink.js";
import { ConsoleSink } from "./console-sink.js";
import { FileSink } from "./file-sink.js";

/** Permissions for directories created on the way to a log file (before umask). */
export const LOG_DIR_MODE = 0o777;

/** Trim and convert Windows separators so `a\\b.log` and `a/b.log` name the same file. */
export function normalizeLogPath(path: string): string {
  return path.trim().replaceAll("\\", "/");
}

/**
 * Pick the sink for a destination: console when no path is given,
 * otherwise an append-mode file, creating missing parent directories first.
 */
export function resolveSink(destinationPath?: string): LogSink {
  if (destinationPath === undefined) return new ConsoleSink();

  const path = normalizeLogPath(destinationPath);
  const lastSlash = path.lastIndexOf("/");
  try {
    if (lastSlash > 0) {
      mkdirSync(path.slice(0, lastSlash), { recursive: true, mode: LOG_DIR_MODE });
    }
    return FileSink.open(path);
  } catch (err) {
    throw new ConstructionError(`Failed to open log destination "${path}": ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
