import { describe, it, expect } from "vitest";
import { pino } from "pino";
import { EventBus } from "../../src/events/event_bus.js";
import { LogEventSink } from "../../src/events/log_sink.js";
import { MongoEventSink, type LogStore } from "../../src/events/mongo_sink.js";
import { PerformanceTracker } from "../../src/events/performance_tracker.js";
import type { EventSink, PipelineEvent } from "../../src/events/types.js";
import type { IDocumentLog } from "../../src/models/documentLog.js";
import type { IQueryLog } from "../../src/models/queryLog.js";

const AT = new Date("2026-01-02T03:04:05.000Z");

class MemoryStore<T> implements LogStore<T> {
  readonly docs: T[] = [];
  async create(doc: T): Promise<T> {
    this.docs.push(doc);
    return doc;
  }
}

describe("EventBus", () => {
  it("should stamp events and hand them to every sink", () => {
    const seen: PipelineEvent[] = [];
    const bus = new EventBus([{ name: "memory", handle: (event) => void seen.push(event) }]);

    bus.emit({ type: "cache_hit", documentId: "doc", question: "q", at: AT });
    bus.emit({ type: "cache_miss", documentId: "doc", question: "q" });

    expect(seen[0]).toEqual({ type: "cache_hit", documentId: "doc", question: "q", at: AT });
    expect(seen[1].at).toBeInstanceOf(Date);
  });

  it("should keep going when a sink throws or rejects", async () => {
    const seen: string[] = [];
    const throwing: EventSink = {
      name: "throwing",
      handle: () => {
        throw new Error("sync failure");
      },
    };
    const rejecting: EventSink = { name: "rejecting", handle: async () => Promise.reject(new Error("async failure")) };
    const memory: EventSink = { name: "memory", handle: (event) => void seen.push(event.type) };
    const bus = new EventBus([throwing, rejecting, memory], pino({ level: "silent" }));

    expect(() => bus.emit({ type: "cache_hit", documentId: "doc", question: "q" })).not.toThrow();
    await bus.flush();

    expect(seen).toEqual(["cache_hit"]);
  });

  it("should wait for pending writes on flush", async () => {
    const store = new MemoryStore<IQueryLog>();
    const bus = new EventBus([new MongoEventSink({ documentLogs: new MemoryStore<IDocumentLog>(), queryLogs: store })]);

    bus.emit({
      type: "question_failed",
      documentId: "doc",
      question: "q",
      errorCode: "TIMEOUT",
      errorMessage: "Deadline exceeded",
    });
    await bus.flush();

    expect(store.docs).toHaveLength(1);
  });
});

describe("PerformanceTracker", () => {
  it("should aggregate durations per operation and the cache hit rate", () => {
    const tracker = new PerformanceTracker();
    const base = { documentId: "doc", question: "q", at: AT };

    tracker.handle({ ...base, type: "retrieval_completed", latencyMs: 10, scores: [] });
    tracker.handle({ ...base, type: "retrieval_completed", latencyMs: 30, scores: [] });
    tracker.handle({ ...base, type: "cache_miss" });
    tracker.handle({ ...base, type: "cache_hit" });
    tracker.handle({ ...base, type: "cache_hit" });
    tracker.handle({ ...base, type: "cache_hit" });
    tracker.handle({ ...base, type: "question_failed", errorCode: "TIMEOUT", errorMessage: "late" });

    expect(tracker.report()).toEqual({
      operations: {
        retrieval: { count: 2, avgDurationMs: 20, minDurationMs: 10, maxDurationMs: 30, totalDurationMs: 40 },
      },
      cache: { hits: 3, misses: 1, hitRate: 0.75 },
      failedQuestions: 1,
    });
  });

  it("should start over after reset", () => {
    const tracker = new PerformanceTracker();
    tracker.record("generation", 5);
    tracker.reset();

    expect(tracker.report()).toEqual({ operations: {}, cache: { hits: 0, misses: 0, hitRate: 0 }, failedQuestions: 0 });
  });
});

describe("MongoEventSink", () => {
  const setup = () => {
    const documentLogs = new MemoryStore<IDocumentLog>();
    const queryLogs = new MemoryStore<IQueryLog>();
    return { documentLogs, queryLogs, sink: new MongoEventSink({ documentLogs, queryLogs }) };
  };

  it("should log a successful ingestion", async () => {
    const { documentLogs, sink } = setup();

    await sink.handle({
      type: "ingestion_completed",
      documentId: "doc",
      source: "https://docs.test/a.txt",
      configFingerprint: "fp",
      chunkCount: 2,
      latencyMs: 12,
      requestId: "req-1",
      at: AT,
    });

    expect(documentLogs.docs).toEqual([
      {
        documentId: "doc",
        source: "https://docs.test/a.txt",
        status: "success",
        chunkCount: 2,
        processingTimeMs: 12,
        configFingerprint: "fp",
        requestId: "req-1",
        createdAt: AT,
      },
    ]);
  });

  it("should log answered questions with their scores", async () => {
    const { queryLogs, sink } = setup();

    await sink.handle({
      type: "generation_completed",
      documentId: "doc",
      question: "What is the grace period?",
      answer: "30 days",
      latencyMs: 40,
      truncated: false,
      scores: [1, 0],
      at: AT,
    });

    expect(queryLogs.docs[0]).toMatchObject({
      question: "What is the grace period?",
      answer: "30 days",
      status: "answered",
      similarityScores: [1, 0],
    });
  });

  it("should ignore events it does not persist", async () => {
    const { documentLogs, queryLogs, sink } = setup();

    await sink.handle({ type: "cache_hit", documentId: "doc", question: "q", at: AT });

    expect(documentLogs.docs).toEqual([]);
    expect(queryLogs.docs).toEqual([]);
  });
});

describe("LogEventSink", () => {
  it("should warn when a generation was truncated", () => {
    const lines: string[] = [];
    const log = pino({ level: "debug" }, { write: (line: string) => void lines.push(line) });

    new LogEventSink(log).handle({
      type: "generation_completed",
      documentId: "doc",
      question: "q",
      answer: "partial",
      latencyMs: 5,
      truncated: true,
      scores: [],
      at: AT,
    });

    const records: { level: number; msg: string }[] = lines.map((line) => JSON.parse(line));
    expect(records.map((r) => [r.level, r.msg])).toEqual([
      [40, "Generation hit the token limit"],
      [30, "Generated answer"],
    ]);
  });
});
