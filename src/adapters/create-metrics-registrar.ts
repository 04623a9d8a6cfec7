import type { Logger } from "../interfaces/logger.js";
import type { ResolvedServiceConfig } from "../types/config.js";
import { PrometheusMetricsRegistrar } from "./prometheus-metrics-registrar.js";

type PromClient = typeof import("prom-client");

export function createMetricsRegistrar(
  promClient: PromClient,
  config: ResolvedServiceConfig,
  logger?: Logger,
): PrometheusMetricsRegistrar {
  return new PrometheusMetricsRegistrar(promClient, {
    prefix: config.metrics.prefix,
    defaultLabels: config.metrics.defaultLabels,
    logger,
  });
}
