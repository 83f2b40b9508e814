import type { PerformanceMetrics } from './types.js';

export interface AggregatedMetrics {
  tool: string;
  count: number;
  total_latency_ms: number;
  avg_latency_ms: number;
  min_latency_ms: number;
  max_latency_ms: number;
  success_rate: number;
  errors: number;
  /** Failures grouped by classified error kind */
  error_kinds: Record<string, number>;
}

export interface MetricsSnapshot {
  total_requests: number;
  aggregated: AggregatedMetrics[];
  recent: PerformanceMetrics[];
}

export class MetricsCollector {
  private metrics: PerformanceMetrics[] = [];
  private readonly maxMetrics = 10000; // keep the last 10k in memory

  constructor(private readonly enabled: boolean) {}

  record(metric: PerformanceMetrics): void {
    if (!this.enabled) return;

    this.metrics.push({
      ...metric,
      timestamp: metric.timestamp || new Date().toISOString(),
    });

    if (this.metrics.length > this.maxMetrics) {
      this.metrics = this.metrics.slice(-this.maxMetrics);
    }
  }

  getMetrics(): MetricsSnapshot {
    if (!this.enabled) {
      return { total_requests: 0, aggregated: [], recent: [] };
    }

    return {
      total_requests: this.metrics.length,
      aggregated: this.aggregateByTool(),
      recent: this.metrics.slice(-100),
    };
  }

  private aggregateByTool(): AggregatedMetrics[] {
    const grouped = new Map<string, PerformanceMetrics[]>();

    for (const metric of this.metrics) {
      const bucket = grouped.get(metric.tool);
      if (bucket) {
        bucket.push(metric);
      } else {
        grouped.set(metric.tool, [metric]);
      }
    }

    const result: AggregatedMetrics[] = [];

    for (const [tool, metrics] of grouped.entries()) {
      const latencies = metrics.map((m) => m.latency_ms);
      const total = latencies.reduce((a, b) => a + b, 0);
      const successes = metrics.filter((m) => m.success).length;
      const errorKinds: Record<string, number> = {};
      for (const metric of metrics) {
        if (!metric.success && metric.error) {
          errorKinds[metric.error] = (errorKinds[metric.error] ?? 0) + 1;
        }
      }

      result.push({
        tool,
        count: metrics.length,
        total_latency_ms: total,
        avg_latency_ms: Math.round(total / metrics.length),
        min_latency_ms: Math.min(...latencies),
        max_latency_ms: Math.max(...latencies),
        success_rate: Math.round((successes / metrics.length) * 100),
        errors: metrics.length - successes,
        error_kinds: errorKinds,
      });
    }

    // Most used first
    return result.sort((a, b) => b.count - a.count);
  }

  clear(): void {
    this.metrics = [];
  }
}
