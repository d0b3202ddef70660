import type { EventSink, PipelineEvent } from "./types.js";

export type TrackedOperation = "ingestion" | "retrieval" | "generation" | "request";

export interface OperationStats {
  count: number;
  avgDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
  totalDurationMs: number;
}

export interface PerformanceReport {
  operations: Partial<Record<TrackedOperation, OperationStats>>;
  cache: { hits: number; misses: number; hitRate: number };
  failedQuestions: number;
}

interface Accumulator {
  count: number;
  total: number;
  min: number;
  max: number;
}

/** Running latency aggregates per operation, plus cache hit ratio. */
export class PerformanceTracker implements EventSink {
  readonly name = "performance";

  private readonly stats = new Map<TrackedOperation, Accumulator>();
  private cacheHits = 0;
  private cacheMisses = 0;
  private failedQuestions = 0;

  handle(event: PipelineEvent): void {
    switch (event.type) {
      case "ingestion_completed":
        this.record("ingestion", event.latencyMs);
        break;
      case "retrieval_completed":
        this.record("retrieval", event.latencyMs);
        break;
      case "generation_completed":
        this.record("generation", event.latencyMs);
        break;
      case "request_completed":
        this.record("request", event.latencyMs);
        break;
      case "cache_hit":
        this.cacheHits++;
        break;
      case "cache_miss":
        this.cacheMisses++;
        break;
      case "question_failed":
        this.failedQuestions++;
        break;
      default:
        break;
    }
  }

  record(operation: TrackedOperation, durationMs: number): void {
    const acc = this.stats.get(operation);
    if (!acc) {
      this.stats.set(operation, { count: 1, total: durationMs, min: durationMs, max: durationMs });
      return;
    }
    acc.count++;
    acc.total += durationMs;
    acc.min = Math.min(acc.min, durationMs);
    acc.max = Math.max(acc.max, durationMs);
  }

  report(): PerformanceReport {
    const operations: PerformanceReport["operations"] = {};
    for (const [operation, acc] of this.stats) {
      operations[operation] = {
        count: acc.count,
        avgDurationMs: acc.total / acc.count,
        minDurationMs: acc.min,
        maxDurationMs: acc.max,
        totalDurationMs: acc.total,
      };
    }
    const lookups = this.cacheHits + this.cacheMisses;
    return {
      operations,
      cache: {
        hits: this.cacheHits,
        misses: this.cacheMisses,
        hitRate: lookups === 0 ? 0 : this.cacheHits / lookups,
      },
      failedQuestions: this.failedQuestions,
    };
  }

  reset(): void {
    this.stats.clear();
    this.cacheHits = 0;
    this.cacheMisses = 0;
    this.failedQuestions = 0;
  }
}
