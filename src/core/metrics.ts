import type { MetricLabels, Metrics } from '../types/index.js';

/**
 * Summary of a histogram's observations.
 */
export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
}

function seriesKey(name: string, labels?: MetricLabels): string {
  if (!labels) return name;
  const parts = Object.keys(labels)
    .sort()
    .map((k) => `${k}=${labels[k] ?? ''}`);
  return parts.length > 0 ? `${name}{${parts.join(',')}}` : name;
}

/**
 * Process-local metrics registry.
 *
 * Keeps the latest gauge value, counter totals and histogram summaries per
 * series (`name{label=value,...}`). Read back by the status surface and tests.
 */
export class InMemoryMetrics implements Metrics {
  private readonly gauges = new Map<string, number>();
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, HistogramSummary>();

  gauge(name: string, value: number, labels?: MetricLabels): void {
    this.gauges.set(seriesKey(name, labels), value);
  }

  counter(name: string, labels?: MetricLabels, increment = 1): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + increment);
  }

  histogram(name: string, value: number, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    const current = this.histograms.get(key);
    if (!current) {
      this.histograms.set(key, { count: 1, sum: value, min: value, max: value });
      return;
    }
    current.count++;
    current.sum += value;
    current.min = Math.min(current.min, value);
    current.max = Math.max(current.max, value);
  }

  getGauge(name: string, labels?: MetricLabels): number | undefined {
    return this.gauges.get(seriesKey(name, labels));
  }

  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: MetricLabels): HistogramSummary | undefined {
    const summary = this.histograms.get(seriesKey(name, labels));
    return summary ? { ...summary } : undefined;
  }

  /**
   * Plain-object dump of every series.
   */
  toJSON(): {
    gauges: Record<string, number>;
    counters: Record<string, number>;
    histograms: Record<string, HistogramSummary>;
  } {
    return {
      gauges: Object.fromEntries(this.gauges),
      counters: Object.fromEntries(this.counters),
      histograms: Object.fromEntries(
        [...this.histograms].map(([k, v]) => [k, { ...v }] as const)
      ),
    };
  }
}

export function createMetrics(): InMemoryMetrics {
  return new InMemoryMetrics();
}
