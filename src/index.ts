/**
 * service-kit public API barrel.
 *
 * Bunyan-format structured logging, Prometheus metrics registration and the
 * configuration that wires them together.
 * @module
 */

// Logging
export { BufferedSink, DEFAULT_BUFFER_SIZE } from "./adapters/buffered-sink.js";
export type { ConsoleStream } from "./adapters/console-sink.js";
export { ConsoleSink } from "./adapters/console-sink.js";
export { createLogger } from "./adapters/create-logger.js";
export { FileSink, LOG_FILE_MODE } from "./adapters/file-sink.js";
export { LOG_DIR_MODE, normalizeLogPath, resolveSink } from "./adapters/sink-resolver.js";
export type {
  CloseResult,
  SinkState,
  StructuredLoggerOptions,
} from "./adapters/structured-logger.js";
export {
  BUNYAN_SYNTAX_VERSION,
  LogLevel,
  parseLogLevel,
  serializeRecord,
  StructuredLogger,
} from "./adapters/structured-logger.js";
export type { LogSink, LogSinkKind } from "./interfaces/log-sink.js";
export type { LogError, LogFields, Logger } from "./interfaces/logger.js";
export { formatBunyanTime } from "./utils/bunyan-time.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";

// Metrics
export { createMetricsRegistrar } from "./adapters/create-metrics-registrar.js";
export type { PrometheusMetricsRegistrarOptions } from "./adapters/prometheus-metrics-registrar.js";
export {
  buildFqName,
  DEFAULT_HISTOGRAM_BUCKETS,
  initCounterVector,
  PrometheusMetricsRegistrar,
} from "./adapters/prometheus-metrics-registrar.js";
export { handleMetrics } from "./http/metrics-endpoint.js";
export type { MetricsServerOptions } from "./http/metrics-server.js";
export { createMetricsServer, startMetricsServer } from "./http/metrics-server.js";
export type {
  CounterHandle,
  GaugeHandle,
  HistogramHandle,
  HistogramOptions,
  HistogramVectorOptions,
  LabeledMetric,
  MetricOptions,
  MetricsSource,
  VectorMetricOptions,
} from "./interfaces/metrics.js";

// Configuration
export {
  logLevelNameSchema,
  serviceConfigSchema,
  serviceEnvSchema,
} from "./config/config-schema.js";
export type { LoadConfigOptions } from "./config/load-config.js";
export { loadConfig } from "./config/load-config.js";
export type { LogLevelName, ResolvedServiceConfig, ServiceConfig } from "./types/config.js";
export { DEFAULT_CONFIG, parseConfig, resolveConfig } from "./types/config.js";

// Errors
export type { MetricsErrorCode, ShutdownPhase } from "./errors.js";
export {
  ConfigError,
  ConstructionError,
  errorMessage,
  LoggerClosedError,
  MetricsError,
  SerializationError,
  ServiceKitError,
  ShutdownError,
  SinkWriteError,
  toServiceKitError,
} from "./errors.js";
