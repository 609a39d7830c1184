/**
 * Prometheus Metrics
 * Simple metrics registry without external dependencies
 */

type MetricType = "counter" | "gauge" | "histogram";

interface HistogramSeries {
  /** Per-bucket counts, not cumulative; index matches `Metric.buckets`. */
  bucketCounts: number[];
  sum: number;
  count: number;
}

interface Metric {
  name: string;
  help: string;
  type: MetricType;
  values: Map<string, number>;
  buckets: number[];
  series: Map<string, HistogramSeries>;
}

export class MetricsRegistry {
  private metrics = new Map<string, Metric>();

  private register(name: string, help: string, type: MetricType, buckets: number[] = []): void {
    this.metrics.set(name, { name, help, type, values: new Map(), buckets, series: new Map() });
  }

  counter(name: string, help: string): void {
    this.register(name, help, "counter");
  }

  gauge(name: string, help: string): void {
    this.register(name, help, "gauge");
  }

  histogram(name: string, help: string, buckets: number[]): void {
    this.register(name, help, "histogram", [...buckets].sort((a, b) => a - b));
  }

  inc(name: string, labels: Record<string, string> = {}, value = 1): void {
    const metric = this.metrics.get(name);
    if (!metric || metric.type !== "counter") return;
    const key = this.labelsToKey(labels);
    metric.values.set(key, (metric.values.get(key) ?? 0) + value);
  }

  set(name: string, labels: Record<string, string>, value: number): void {
    const metric = this.metrics.get(name);
    if (!metric || metric.type !== "gauge") return;
    metric.values.set(this.labelsToKey(labels), value);
  }

  observe(name: string, labels: Record<string, string>, value: number): void {
    const metric = this.metrics.get(name);
    if (!metric || metric.type !== "histogram") return;
    const key = this.labelsToKey(labels);
    let series = metric.series.get(key);
    if (!series) {
      series = { bucketCounts: metric.buckets.map(() => 0), sum: 0, count: 0 };
      metric.series.set(key, series);
    }
    const index = metric.buckets.findIndex(bucket => value <= bucket);
    if (index >= 0) series.bucketCounts[index] = (series.bucketCounts[index] ?? 0) + 1;
    series.sum += value;
    series.count += 1;
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
          let cumulative = 0;
          metric.buckets.forEach((bucket, i) => {
            cumulative += series.bucketCounts[i] ?? 0;
            lines.push(`${metric.name}_bucket{${prefix}le="${bucket}"} ${cumulative}`);
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

    return lines.join("\n");
  }

  reset(): void {
    for (const metric of this.metrics.values()) {
      metric.values.clear();
      metric.series.clear();
    }
  }

  private labelsToKey(labels: Record<string, string>): string {
    return Object.entries(labels)
      .map(([k, v]) => `${k}="${v.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`)
      .join(",");
  }
}

export const metrics = new MetricsRegistry();

metrics.counter("regguard_decisions_total", "Registration decisions by verdict");
metrics.histogram("regguard_eval_latency_ms", "Evaluation latency in milliseconds", [1, 5, 10, 25, 50, 100, 250, 500]);
metrics.gauge("regguard_up", "Sidecar status");
metrics.gauge("regguard_policy_rules", "Number of rules in the active policy");
metrics.counter("regguard_errors_total", "Errors by type");

export function recordDecision(verdict: string, latencyMs: number): void {
  metrics.inc("regguard_decisions_total", { verdict });
  metrics.observe("regguard_eval_latency_ms", { verdict }, latencyMs);
}

export function recordUp(up: boolean): void {
  metrics.set("regguard_up", {}, up ? 1 : 0);
}

export function recordPolicyRules(count: number): void {
  metrics.set("regguard_policy_rules", {}, count);
}

/** Types in use: invalid_input, rule_evaluation, policy_reload, internal. */
export function recordError(errorType: string): void {
  metrics.inc("regguard_errors_total", { type: errorType });
}

export function getMetrics(): string {
  return metrics.toPrometheus();
}
