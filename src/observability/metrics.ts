import type { MetricCounterName, MetricTimerName } from "./types";

export interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      catalog_pages: this.getCounter("catalog_pages"),
      catalog_results: this.getCounter("catalog_results"),
      links_skipped: this.getCounter("links_skipped"),
      manifests_written: this.getCounter("manifests_written"),
      manifests_skipped: this.getCounter("manifests_skipped"),
      items_fetched: this.getCounter("items_fetched"),
      items_failed: this.getCounter("items_failed"),
      item_retries: this.getCounter("item_retries"),
      artifacts_written: this.getCounter("artifacts_written"),
      artifacts_skipped: this.getCounter("artifacts_skipped"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      catalog_page_ms: this.summarize("catalog_page_ms"),
      item_fetch_ms: this.summarize("item_fetch_ms"),
      artifact_write_ms: this.summarize("artifact_write_ms"),
    };
  }

  printSummary(): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          counters: this.getCounters(),
          timers: this.getTimerSummaries(),
        },
        null,
        2,
      ),
    );
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = Number.POSITIVE_INFINITY;
    let max = Number.NEGATIVE_INFINITY;
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
