import { consoleWriter } from "./logger";
import { LogWriter, MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, TimerSummary>;
}

/** Run-scoped counters and duration samples, reported once when a command exits. */
export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();
  private readonly clock: () => number;

  constructor(clock: () => number = Date.now) {
    this.clock = clock;
  }

  incrementCounter(name: MetricCounterName, value = 1): void {
    if (value === 0) {
      return;
    }
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  /** Returns a stop function that records and returns the elapsed milliseconds. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.clock();
    let stopped: number | undefined;
    return () => {
      if (stopped === undefined) {
        stopped = this.clock() - startedAt;
        this.record(name, stopped);
      }
      return stopped;
    };
  }

  record(name: MetricTimerName, durationMs: number): void {
    const samples = this.timers.get(name);
    if (samples) {
      samples.push(durationMs);
    } else {
      this.timers.set(name, [durationMs]);
    }
  }

  getCounters(): Record<MetricCounterName, number> {
    const count = (name: MetricCounterName) => this.counters.get(name) ?? 0;
    return {
      pages_crawled: count("pages_crawled"),
      pages_failed: count("pages_failed"),
      docs_discovered: count("docs_discovered"),
      downloads_ok: count("downloads_ok"),
      downloads_failed: count("downloads_failed"),
      downloads_skipped: count("downloads_skipped"),
      fetch_retries: count("fetch_retries"),
    };
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: this.getCounters(),
      timers: {
        page_fetch_ms: this.summarize("page_fetch_ms"),
        download_ms: this.summarize("download_ms"),
      },
    };
  }

  printSummary(writer: LogWriter = consoleWriter): void {
    writer(
      "info",
      JSON.stringify({ ts: new Date(this.clock()).toISOString(), level: "info", msg: "metrics_summary", ...this.snapshot() }),
    );
  }

  private summarize(name: MetricTimerName): TimerSummary {
    const samples = this.timers.get(name) ?? [];
    if (samples.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0, total: 0 };
    }

    const total = samples.reduce((sum, value) => sum + value, 0);
    return {
      count: samples.length,
      min: Math.min(...samples),
      max: Math.max(...samples),
      avg: Number((total / samples.length).toFixed(2)),
      total,
    };
  }
}
