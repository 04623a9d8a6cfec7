import type { ResolvedServiceConfig } from "../types/config.js";
import { StructuredLogger } from "./structured-logger.js";

/** Console or file logger per `config.log`; a positive `bufferSize` buffers writes. */
export function createLogger(config: ResolvedServiceConfig): StructuredLogger {
  const { level, path, bufferSize } = config.log;
  const logger =
    bufferSize > 0
      ? StructuredLogger.createBuffered(config.name, bufferSize, path)
      : StructuredLogger.create(config.name, path);
  logger.setLevel(level);
  return logger;
}
