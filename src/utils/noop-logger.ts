import type { Logger } from "../interfaces/logger.js";

export class NoopLogger implements Logger {
  trace(): undefined {
    return undefined;
  }
  debug(): undefined {
    return undefined;
  }
  info(): undefined {
    return undefined;
  }
  warn(): undefined {
    return undefined;
  }
  error(): undefined {
    return undefined;
  }
  fatal(): undefined {
    return undefined;
  }
}

/** Shared instance for components given no logger. */
export const noopLogger: Logger = new NoopLogger();
