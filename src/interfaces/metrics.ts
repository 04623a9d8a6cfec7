/**
 * Metric registration options and the handles returned for recording values.
 * @module
 */

export interface MetricOptions {
  /** Required; combined with namespace and subsystem into the full metric name. */
  name: string;
  namespace?: string;
  subsystem?: string;
  /** Required help text shown in the exposition output. */
  help: string;
  /** Constant labels attached to every series of the metric. */
  labels?: Record<string, string>;
}

export interface VectorMetricOptions extends MetricOptions {
  labelNames: string[];
}

export interface HistogramOptions extends MetricOptions {
  /** Upper bounds in seconds. Defaults to DEFAULT_HISTOGRAM_BUCKETS. */
  buckets?: number[];
}

export interface HistogramVectorOptions extends HistogramOptions {
  labelNames: string[];
}

export interface CounterHandle {
  inc(value?: number): void;
}

export interface GaugeHandle {
  inc(value?: number): void;
  dec(value?: number): void;
  set(value: number): void;
}

export interface HistogramHandle {
  observe(value: number): void;
}

/** A metric with variable labels; each label set selects one series. */
export interface LabeledMetric<H> {
  readonly labelNames: readonly string[];
  withLabels(labels: Record<string, string>): H;
}

/** Anything that can render Prometheus exposition text. */
export interface MetricsSource {
  readonly contentType: string;
  getMetricsOutput(): Promise<string>;
}
