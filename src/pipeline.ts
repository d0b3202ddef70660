import type { Settings } from "./config/settings.js";
import { createModelBackends, type ModelBackends } from "./backends/index.js";
import { EventBus } from "./events/event_bus.js";
import { LogEventSink } from "./events/log_sink.js";
import { MongoEventSink } from "./events/mongo_sink.js";
import { PerformanceTracker } from "./events/performance_tracker.js";
import type { EventSink } from "./events/types.js";
import { AnswerCache } from "./services/answer_cache.js";
import { AnswerGenerator } from "./services/answer_generator.js";
import { boundaryFor } from "./services/chunker.js";
import { DocumentSource, type DocumentLoader } from "./services/document_source.js";
import { DocumentStore } from "./services/document_store.js";
import { Embedder } from "./services/embedder.js";
import { QueryOrchestrator } from "./services/query_orchestrator.js";
import { Retriever } from "./services/retriever.js";

/* ────────────────────────────────────  wiring  ─────────────── */

export interface PipelineDeps {
  /** Model backends; built from settings when omitted. */
  backends?: ModelBackends;
  loader?: DocumentLoader;
  /** Extra sinks on top of the log sink and performance tracker. */
  sinks?: EventSink[];
  now?: () => number;
}

export interface Pipeline {
  orchestrator: QueryOrchestrator;
  store: DocumentStore;
  cache: AnswerCache;
  events: EventBus;
  performance: PerformanceTracker;
  /** Waits for pending event writes and drops in-memory state. */
  shutdown(): Promise<void>;
}

export function createPipeline(settings: Settings, deps: PipelineDeps = {}): Pipeline {
  const backends = deps.backends ?? createModelBackends(settings.models);

  const performance = new PerformanceTracker();
  const sinks: EventSink[] = [new LogEventSink(), performance, ...(deps.sinks ?? [])];
  if (settings.mongoUrl) sinks.push(new MongoEventSink());
  const events = new EventBus(sinks);

  const embedder = new Embedder(backends.embedding, {
    batchSize: settings.embedding.batchSize,
    retry: settings.retry,
  });
  const store = new DocumentStore({ embedder, events, maxDocuments: settings.store.maxDocuments });
  const cache = new AnswerCache({ capacity: settings.cache.capacity, ttlMs: settings.cache.ttlMs, now: deps.now });
  // sweep expired answers once per TTL; reads drop them lazily in between
  const pruneTimer = settings.cache.ttlMs > 0 ? setInterval(() => cache.prune(), settings.cache.ttlMs) : undefined;
  pruneTimer?.unref();

  const orchestrator = new QueryOrchestrator({
    store,
    cache,
    events,
    retriever: new Retriever(embedder),
    generator: new AnswerGenerator(backends.generation, settings.retry),
    loader:
      deps.loader ??
      new DocumentSource({ maxBytes: settings.maxDocumentBytes, timeoutMs: settings.models.timeoutMs }),
    requestTimeoutMs: settings.requestTimeoutMs,
    config: {
      chunkSize: settings.chunking.chunkSize,
      overlap: settings.chunking.overlap,
      boundary: boundaryFor(settings.chunking.boundary),
      topK: settings.retrieval.topK,
      ...settings.generation,
    },
  });

  return {
    orchestrator,
    store,
    cache,
    events,
    performance,
    async shutdown() {
      clearInterval(pruneTimer);
      await events.flush();
      store.clear();
      cache.clear();
    },
  };
}
