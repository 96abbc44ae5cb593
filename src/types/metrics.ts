/**
 * Metrics port.
 *
 * Components report counters and gauges through this interface; the default
 * build wires an in-memory registry that the status surface can read.
 */

/**
 * Labels attached to a metric sample.
 */
export type MetricLabels = Record<string, string>;

export interface Metrics {
  /** Set a value that can go up or down (e.g. `observation_queue_depth`). */
  gauge(name: string, value: number, labels?: MetricLabels): void;

  /** Increment a monotonic counter (e.g. `cycles_started_total`). */
  counter(name: string, labels?: MetricLabels, increment?: number): void;

  /** Record one observation of a distribution (e.g. `gateway_duration_ms`). */
  histogram(name: string, value: number, labels?: MetricLabels): void;
}
