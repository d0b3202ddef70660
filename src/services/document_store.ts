/**
 * Document Store
 *
 * Owns every ingested document's chunks, vectors and index, keyed by document
 * identity. Ingestion is idempotent per (identity, config) and single-flight
 * per identity: concurrent callers share one build instead of paying for
 * duplicate embedding calls. Least recently used documents are evicted once
 * `maxDocuments` is exceeded.
 */

import type { EventBus } from "../events/event_bus.js";
import { stableHash } from "../utils/hash.js";
import { moduleLogger } from "../utils/logger.js";
import { toPipelineError } from "../utils/errors.js";
import { type BoundaryDetector, type Chunk, splitText, validateChunkOptions } from "./chunker.js";
import type { Embedder, Vector } from "./embedder.js";
import { VectorIndex } from "./vector_index.js";

export interface IngestConfig {
  chunkSize: number;
  overlap: number;
  boundary?: BoundaryDetector;
}

export interface DocumentIndex {
  documentId: string;
  /** Identity of (chunking config, embedding model) that built this index. */
  configFingerprint: string;
  chunks: readonly Chunk[];
  vectors: readonly Vector[];
  index: VectorIndex;
  builtAt: Date;
}

export interface IngestContext {
  requestId?: string;
  source?: string;
  signal?: AbortSignal;
}

export interface DocumentStoreOptions {
  embedder: Embedder;
  events?: EventBus;
  maxDocuments: number;
}

interface BuildState {
  fingerprint: string;
  // set by evict/clear; the build then returns its index without publishing it
  discarded: boolean;
}

interface InFlightBuild {
  state: BuildState;
  promise: Promise<DocumentIndex>;
}

const log = moduleLogger("document_store");

export class DocumentStore {
  private readonly embedder: Embedder;
  private readonly events?: EventBus;
  private readonly maxDocuments: number;

  // Map keeps insertion order; re-inserting on access makes it an LRU
  private readonly indexes = new Map<string, DocumentIndex>();
  private readonly inflight = new Map<string, InFlightBuild>();

  constructor(options: DocumentStoreOptions) {
    this.embedder = options.embedder;
    this.events = options.events;
    this.maxDocuments = options.maxDocuments;
  }

  /** Fingerprint of everything that shapes an index's content. */
  fingerprint(config: IngestConfig): string {
    return stableHash({
      chunkSize: config.chunkSize,
      overlap: config.overlap,
      boundary: config.boundary?.name ?? "none",
      embeddingModel: this.embedder.modelId,
    }).slice(0, 16);
  }

  /**
   * Returns the cached index when identity and config match; otherwise builds
   * (or joins the build already running for this identity) and replaces.
   */
  async ingest(
    documentId: string,
    text: string,
    config: IngestConfig,
    context: IngestContext = {}
  ): Promise<DocumentIndex> {
    validateChunkOptions(config);
    const fingerprint = this.fingerprint(config);

    const cached = this.indexes.get(documentId);
    if (cached && cached.configFingerprint === fingerprint) {
      this.touch(documentId, cached);
      return cached;
    }

    const running = this.inflight.get(documentId);
    if (running) {
      if (running.state.fingerprint === fingerprint) return running.promise;
      // one build per identity: let the other config finish, then try again
      await running.promise.catch(() => undefined);
      return this.ingest(documentId, text, config, context);
    }

    const state: BuildState = { fingerprint, discarded: false };
    const promise = this.build(documentId, text, config, state, context).finally(() => {
      if (this.inflight.get(documentId)?.state === state) this.inflight.delete(documentId);
    });
    this.inflight.set(documentId, { state, promise });
    return promise;
  }

  get(documentId: string): DocumentIndex | undefined {
    const found = this.indexes.get(documentId);
    if (found) this.touch(documentId, found);
    return found;
  }

  has(documentId: string): boolean {
    return this.indexes.has(documentId);
  }

  /**
   * Drops the document's index, chunks and vectors. A build still running for
   * it finishes for its callers but is not stored.
   */
  evict(documentId: string): boolean {
    const running = this.inflight.get(documentId);
    if (running) {
      running.state.discarded = true;
      this.inflight.delete(documentId);
    }
    const removed = this.indexes.delete(documentId);
    if (removed || running) log.info({ documentId, buildDiscarded: Boolean(running) }, "Evicted document index");
    return removed || running !== undefined;
  }

  clear(): void {
    for (const running of this.inflight.values()) running.state.discarded = true;
    this.inflight.clear();
    this.indexes.clear();
  }

  get size(): number {
    return this.indexes.size;
  }

  private async build(
    documentId: string,
    text: string,
    config: IngestConfig,
    state: BuildState,
    context: IngestContext
  ): Promise<DocumentIndex> {
    const { fingerprint } = state;
    const started = Date.now();
    const base = { requestId: context.requestId, documentId, source: context.source, configFingerprint: fingerprint };
    this.events?.emit({ type: "ingestion_started", ...base });

    try {
      const chunks = splitText(documentId, text, config);
      const vectors = await this.embedder.embed(
        chunks.map((chunk) => chunk.text),
        context.signal
      );

      // published only once every chunk is embedded
      const built: DocumentIndex = {
        documentId,
        configFingerprint: fingerprint,
        chunks,
        vectors,
        index: VectorIndex.build(vectors),
        builtAt: new Date(),
      };
      if (!state.discarded) {
        this.indexes.delete(documentId);
        this.indexes.set(documentId, built);
        this.enforceCapacity();
      }

      this.events?.emit({
        type: "ingestion_completed",
        ...base,
        chunkCount: chunks.length,
        latencyMs: Date.now() - started,
      });
      return built;
    } catch (err) {
      const error = toPipelineError(err);
      this.events?.emit({
        type: "ingestion_failed",
        ...base,
        latencyMs: Date.now() - started,
        errorCode: error.code,
        errorMessage: error.message,
      });
      throw error;
    }
  }

  private touch(documentId: string, entry: DocumentIndex): void {
    this.indexes.delete(documentId);
    this.indexes.set(documentId, entry);
  }

  private enforceCapacity(): void {
    while (this.indexes.size > this.maxDocuments) {
      const oldest = this.indexes.keys().next();
      if (oldest.done) return;
      this.indexes.delete(oldest.value);
      log.info({ documentId: oldest.value }, "Evicted least recently used document index");
    }
  }
}
