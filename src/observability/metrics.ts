import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

function summarize(samples: readonly number[]): TimerSummary {
  if (samples.length === 0) {
    return { count: 0, min: 0, max: 0, avg: 0 };
  }
  const total = samples.reduce((sum, sample) => sum + sample, 0);
  return {
    count: samples.length,
    min: Math.min(...samples),
    max: Math.max(...samples),
    avg: Number((total / samples.length).toFixed(2)),
  };
}

// Per-run counters and timers, reported once when a command finishes.
export class MetricsRegistry {
  private readonly counters: Record<MetricCounterName, number> = {
    candidates_fetched: 0,
    candidates_dropped: 0,
    candidates_skipped: 0,
    records_archived: 0,
    records_failed: 0,
    records_pending: 0,
    attachments_handled: 0,
    attachments_failed: 0,
  };

  private readonly samples: Record<MetricTimerName, number[]> = {
    mailbox_search_ms: [],
    candidate_ms: [],
    handler_ms: [],
  };

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters[name] += value;
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = performance.now();
    return () => {
      const elapsed = Math.round(performance.now() - startedAt);
      this.samples[name].push(elapsed);
      return elapsed;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return { ...this.counters };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      mailbox_search_ms: summarize(this.samples.mailbox_search_ms),
      candidate_ms: summarize(this.samples.candidate_ms),
      handler_ms: summarize(this.samples.handler_ms),
    };
  }

  report(logger: Logger): void {
    logger.info("metrics_summary", { counters: this.getCounters(), timers: this.getTimerSummaries() });
  }
}
