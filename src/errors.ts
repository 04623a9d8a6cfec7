export class ServiceKitError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ServiceKitError";
    this.code = code;
  }
}

// ── Logger errors ──

/** The log destination could not be prepared (directory creation or file open). */
export class ConstructionError extends ServiceKitError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "LOGGER_CONSTRUCTION", options);
    this.name = "ConstructionError";
  }
}

export class SerializationError extends ServiceKitError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "LOGGER_SERIALIZATION", options);
    this.name = "SerializationError";
  }
}

/** A write to the primary sink failed; `cause` carries the underlying I/O error. */
export class SinkWriteError extends ServiceKitError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "LOGGER_SINK_WRITE", options);
    this.name = "SinkWriteError";
  }
}

export type ShutdownPhase = "flush" | "close";

export class ShutdownError extends ServiceKitError {
  readonly phase: ShutdownPhase;

  constructor(message: string, phase: ShutdownPhase, options?: ErrorOptions) {
    super(message, "LOGGER_SHUTDOWN", options);
    this.name = "ShutdownError";
    this.phase = phase;
  }
}

export class LoggerClosedError extends ServiceKitError {
  constructor(loggerName: string) {
    super(`Logger "${loggerName}" is closed`, "LOGGER_CLOSED");
    this.name = "LoggerClosedError";
  }
}

// ── Metrics and config errors ──

export type MetricsErrorCode = "METRICS_VALIDATION" | "METRICS_REGISTRATION";

export class MetricsError extends ServiceKitError {
  constructor(message: string, code: MetricsErrorCode, options?: ErrorOptions) {
    super(message, code, options);
    this.name = "MetricsError";
  }
}

export class ConfigError extends ServiceKitError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to ServiceKitError (preserves cause chain). */
export function toServiceKitError(value: unknown): ServiceKitError {
  if (value instanceof ServiceKitError) return value;
  if (value instanceof Error) {
    return new ServiceKitError(value.message, "UNKNOWN", { cause: value });
  }
  return new ServiceKitError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
