import { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
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

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
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

  getCounters(): Record<MetricCounterName, number> {
    return {
      pages_fetched: this.getCounter("pages_fetched"),
      inventories_ok: this.getCounter("inventories_ok"),
      inventories_failed: this.getCounter("inventories_failed"),
      minifigures_enriched: this.getCounter("minifigures_enriched"),
      subinventories_resolved: this.getCounter("subinventories_resolved"),
      cache_memory_hits: this.getCounter("cache_memory_hits"),
      cache_disk_hits: this.getCounter("cache_disk_hits"),
      cache_shared_waits: this.getCounter("cache_shared_waits"),
      cache_network_fetches: this.getCounter("cache_network_fetches"),
      cache_fetch_failed: this.getCounter("cache_fetch_failed"),
      colors_refreshed: this.getCounter("colors_refreshed"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      page_fetch_ms: this.summarize("page_fetch_ms"),
      extract_ms: this.summarize("extract_ms"),
      cache_fetch_ms: this.summarize("cache_fetch_ms"),
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
    let min = values[0];
    let max = values[0];
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
