/**
 * Prometheus Metrics
 * Simple metrics registry without external dependencies
 */

type Labels = Record<string, string>;

interface Series {
  name: string;
  help: string;
  type: "counter" | "gauge";
  values: Map<string, number>;
}

/** Cumulative counts per upper bound, as exposed; no raw observations kept. */
export interface HistogramSeries {
  bucketCounts: number[];
  sum: number;
  count: number;
}

interface Histogram {
  name: string;
  help: string;
  type: "histogram";
  buckets: number[];
  series: Map<string, HistogramSeries>;
}

type Metric = Series | Histogram;

export class MetricsRegistry {
  private metrics = new Map<string, Metric>();

  counter(name: string, help: string): void {
    this.metrics.set(name, { name, help, type: "counter", values: new Map() });
  }

  gauge(name: string, help: string): void {
    this.metrics.set(name, { name, help, type: "gauge", values: new Map() });
  }

  histogram(name: string, help: string, buckets: number[]): void {
    this.metrics.set(name, { name, help, type: "histogram", buckets, series: new Map() });
  }

  inc(name: string, labels: Labels = {}, value = 1): void {
    const metric = this.metrics.get(name);
    if (!metric || metric.type !== "counter") return;
    const key = labelsToKey(labels);
    metric.values.set(key, (metric.values.get(key) ?? 0) + value);
  }

  set(name: string, labels: Labels, value: number): void {
    const metric = this.metrics.get(name);
    if (!metric || metric.type !== "gauge") return;
    metric.values.set(labelsToKey(labels), value);
  }

  observe(name: string, labels: Labels, value: number): void {
    const metric = this.metrics.get(name);
    if (!metric || metric.type !== "histogram") return;
    const key = labelsToKey(labels);
    const series = metric.series.get(key) ?? { bucketCounts: metric.buckets.map(() => 0), sum: 0, count: 0 };
    metric.series.set(key, series);
    metric.buckets.forEach((bound, i) => {
      if (value <= bound) series.bucketCounts[i]++;
    });
    series.sum += value;
    series.count++;
  }

  histogramSeries(name: string, labels: Labels): HistogramSeries | undefined {
    const metric = this.metrics.get(name);
    if (!metric || metric.type !== "histogram") return undefined;
    return metric.series.get(labelsToKey(labels));
  }

  /**
   * Export metrics in Prometheus text format
   */
  toPrometheus(): string {
    const lines: string[] = [];

    for (const metric of this.metrics.values()) {
      lines.push(`# HELP ${metric.name} ${metric.help}`);
      lines.push(`# TYPE ${metric.name} ${metric.type}`);

      if (metric.type === "histogram") {
        for (const [labels, series] of metric.series) {
          const prefix = labels ? `${labels},` : "";
          metric.buckets.forEach((bound, i) => {
            lines.push(`${metric.name}_bucket{${prefix}le="${bound}"} ${series.bucketCounts[i]}`);
          });
          lines.push(`${metric.name}_bucket{${prefix}le="+Inf"} ${series.count}`);
          lines.push(`${metric.name}_sum{${labels}} ${series.sum}`);
          lines.push(`${metric.name}_count{${labels}} ${series.count}`);
        }
      } else {
        for (const [labels, value] of metric.values) {
          lines.push(`${metric.name}${labels ? `{${labels}}` : ""} ${value}`);
        }
      }
    }

    return lines.join("\n") + "\n";
  }

  reset(): void {
    for (const metric of this.metrics.values()) {
      if (metric.type === "histogram") {
        metric.series.clear();
      } else {
        metric.values.clear();
      }
    }
  }
}

function labelsToKey(labels: Labels): string {
  return Object.entries(labels)
    .map(([k, v]) => `${k}="${v.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`)
    .join(",");
}

/**
 * The server's metrics. One instance per server so tests do not share counts.
 */
export class KeyturnMetrics {
  readonly registry = new MetricsRegistry();

  constructor() {
    this.registry.gauge("keyturn_up", "Keyturn server status");
    this.registry.counter("keyturn_webhook_events_total", "Webhook deliveries by outcome");
    this.registry.counter("keyturn_validations_total", "License validations by result");
    this.registry.counter("keyturn_checkout_sessions_total", "Checkout session requests by result");
    this.registry.counter("keyturn_rate_limited_total", "Requests rejected by the rate limiter");
    this.registry.histogram(
      "keyturn_request_duration_ms",
      "Request latency in milliseconds",
      [5, 10, 25, 50, 100, 250, 500, 1000, 2500]
    );
  }

  up(isUp: boolean): void {
    this.registry.set("keyturn_up", {}, isUp ? 1 : 0);
  }

  webhook(outcome: string): void {
    this.registry.inc("keyturn_webhook_events_total", { outcome });
  }

  validation(result: string): void {
    this.registry.inc("keyturn_validations_total", { result });
  }

  checkout(result: string): void {
    this.registry.inc("keyturn_checkout_sessions_total", { result });
  }

  rateLimited(scope: string): void {
    this.registry.inc("keyturn_rate_limited_total", { scope });
  }

  request(route: string, method: string, statusCode: number, durationMs: number): void {
    this.registry.observe(
      "keyturn_request_duration_ms",
      { route, method, status: String(statusCode) },
      Math.round(durationMs * 100) / 100
    );
  }

  toPrometheus(): string {
    return this.registry.toPrometheus();
  }
}
