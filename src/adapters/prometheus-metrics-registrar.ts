import { errorMessage, MetricsError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type {
  CounterHandle,
  GaugeHandle,
  HistogramHandle,
  HistogramOptions,
  HistogramVectorOptions,
  LabeledMetric,
  MetricOptions,
  MetricsSource,
  VectorMetricOptions,
} from "../interfaces/metrics.js";
import { noopLogger } from "../utils/noop-logger.js";

type PromClient = typeof import("prom-client");
type PromRegistry = InstanceType<PromClient["Registry"]>;

type MetricKind =
  | "counter"
  | "counter vector"
  | "gauge"
  | "gauge vector"
  | "histogram"
  | "histogram vector";

/** Histogram upper bounds in seconds, from 1ms to 90s. */
export const DEFAULT_HISTOGRAM_BUCKETS: readonly number[] = [
  0.001, 0.0025, 0.005, 0.0075, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 20, 30, 45, 60,
  90,
];

/** Join non-empty parts with `_`, the Prometheus fully-qualified name rule. */
export function buildFqName(
  namespace: string | undefined,
  subsystem: string | undefined,
  name: string,
): string {
  if (!name) return "";
  return [namespace, subsystem, name].filter((part) => part).join("_");
}

export interface PrometheusMetricsRegistrarOptions {
  /** Registry to register into. Defaults to a new private registry. */
  registry?: PromRegistry;
  /** Namespace for metrics that set none. */
  prefix?: string;
  defaultLabels?: Record<string, string>;
  logger?: Logger;
}

interface PreparedMetric {
  fullName: string;
  constLabels: Record<string, string>;
  labelNames: string[];
}

/**
 * Registers counters, gauges and histograms against an explicit prom-client registry.
 * Requires prom-client to be passed in at construction time; nothing touches the
 * global registry, so independent registrars can coexist in one process.
 */
export class PrometheusMetricsRegistrar implements MetricsSource {
  readonly registry: PromRegistry;
  private readonly promClient: PromClient;
  private readonly prefix: string | undefined;
  private readonly logger: Logger;

  constructor(promClient: PromClient, options: PrometheusMetricsRegistrarOptions = {}) {
    this.promClient = promClient;
    this.registry = options.registry ?? new promClient.Registry();
    this.prefix = options.prefix;
    this.logger = options.logger ?? noopLogger;

    if (options.defaultLabels) {
      this.registry.setDefaultLabels(options.defaultLabels);
    }
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  createCounter(options: MetricOptions): CounterHandle {
    const metric = this.prepare("counter", options, []);
    const counter = this.register("counter", metric.fullName, () => {
      return new this.promClient.Counter({
        name: metric.fullName,
        help: options.help,
        labelNames: metric.labelNames,
        registers: [this.registry],
      });
    });
    const series = counter.labels(metric.constLabels);
    series.inc(0);
    return series;
  }

  createCounterVector(options: VectorMetricOptions): LabeledMetric<CounterHandle> {
    const metric = this.prepare("counter vector", options, options.labelNames);
    const counter = this.register("counter vector", metric.fullName, () => {
      return new this.promClient.Counter({
        name: metric.fullName,
        help: options.help,
        labelNames: metric.labelNames,
        registers: [this.registry],
      });
    });
    return {
      labelNames: [...options.labelNames],
      withLabels: (labels) => counter.labels({ ...labels, ...metric.constLabels }),
    };
  }

  createGauge(options: MetricOptions): GaugeHandle {
    const metric = this.prepare("gauge", options, []);
    const gauge = this.register("gauge", metric.fullName, () => {
      return new this.promClient.Gauge({
        name: metric.fullName,
        help: options.help,
        labelNames: metric.labelNames,
        registers: [this.registry],
      });
    });
    const series = gauge.labels(metric.constLabels);
    series.set(0);
    return series;
  }

  createGaugeVector(options: VectorMetricOptions): LabeledMetric<GaugeHandle> {
    const metric = this.prepare("gauge vector", options, options.labelNames);
    const gauge = this.register("gauge vector", metric.fullName, () => {
      return new this.promClient.Gauge({
        name: metric.fullName,
        help: options.help,
        labelNames: metric.labelNames,
        registers: [this.registry],
      });
    });
    return {
      labelNames: [...options.labelNames],
      withLabels: (labels) => gauge.labels({ ...labels, ...metric.constLabels }),
    };
  }

  createHistogram(options: HistogramOptions): HistogramHandle {
    const metric = this.prepare("histogram", options, []);
    const histogram = this.register("histogram", metric.fullName, () => {
      return new this.promClient.Histogram({
        name: metric.fullName,
        help: options.help,
        labelNames: metric.labelNames,
        buckets: [...(options.buckets ?? DEFAULT_HISTOGRAM_BUCKETS)],
        registers: [this.registry],
      });
    });
    if (Object.keys(metric.constLabels).length > 0) histogram.zero(metric.constLabels);
    return histogram.labels(metric.constLabels);
  }

  createHistogramVector(options: HistogramVectorOptions): LabeledMetric<HistogramHandle> {
    const metric = this.prepare("histogram vector", options, options.labelNames);
    const histogram = this.register("histogram vector", metric.fullName, () => {
      return new this.promClient.Histogram({
        name: metric.fullName,
        help: options.help,
        labelNames: metric.labelNames,
        buckets: [...(options.buckets ?? DEFAULT_HISTOGRAM_BUCKETS)],
        registers: [this.registry],
      });
    });
    return {
      labelNames: [...options.labelNames],
      withLabels: (labels) => histogram.labels({ ...labels, ...metric.constLabels }),
    };
  }

  async getMetricsOutput(): Promise<string> {
    return this.registry.metrics();
  }

  reset(): void {
    this.registry.resetMetrics();
  }

  private prepare(
    kind: MetricKind,
    options: MetricOptions,
    labelNames: readonly string[],
  ): PreparedMetric {
    if (!options.name || !options.help) {
      throw new MetricsError(
        `Prometheus ${kind} requires both name and help fields to initialize - ` +
          "missing one or both of those fields",
        "METRICS_VALIDATION",
      );
    }

    const constLabels = options.labels ?? {};
    const clash = labelNames.find((label) => Object.hasOwn(constLabels, label));
    if (clash !== undefined) {
      throw new MetricsError(
        `Prometheus ${kind} label "${clash}" is declared both as a constant and a variable label`,
        "METRICS_VALIDATION",
      );
    }

    return {
      fullName: buildFqName(options.namespace ?? this.prefix, options.subsystem, options.name),
      constLabels,
      labelNames: [...Object.keys(constLabels), ...labelNames],
    };
  }

  private register<M>(kind: MetricKind, fullName: string, create: () => M): M {
    let metric: M;
    try {
      metric = create();
    } catch (err) {
      throw new MetricsError(
        `Failed to register Prometheus ${kind} "${fullName}": ${errorMessage(err)}`,
        "METRICS_REGISTRATION",
        { cause: err },
      );
    }
    this.logger.debug("Registered metric", { metric: fullName, type: kind });
    return metric;
  }
}

/** Seed each label set of a counter vector at 0 so its series export before the first increment. */
export function initCounterVector(
  vector: LabeledMetric<CounterHandle>,
  labelSets: readonly Record<string, string>[],
): void {
  for (const labels of labelSets) {
    vector.withLabels(labels).inc(0);
  }
}
