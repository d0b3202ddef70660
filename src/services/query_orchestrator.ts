/**
 * Query Orchestrator
 *
 * Top-level coordinator for one request (a document reference + N questions):
 *
 *   RECEIVED → INGESTING (skipped when the index is cached) → READY
 *            → ANSWERING → COMPLETED
 *
 * and FAILED when the document can't be loaded or indexed, in which case the
 * ingestion error propagates to the caller. Questions are
 * answered concurrently; one failing question turns into an error marker in
 * its own slot and never aborts its siblings. Answers come back in input order.
 */

import { v4 as uuid } from "uuid";
import type { EventBus } from "../events/event_bus.js";
import { createDeadline, raceAbort } from "../utils/deadline.js";
import { DocumentIngestionFailedError, toPipelineError, type PipelineErrorCode } from "../utils/errors.js";
import { stableHash } from "../utils/hash.js";
import {
  type AnswerCache,
  type CacheEntryInput,
  type ChunkReference,
  cacheKey,
  normalizeQuestion,
} from "./answer_cache.js";
import type { AnswerGenerator } from "./answer_generator.js";
import type { BoundaryDetector } from "./chunker.js";
import type { DocumentIndex, DocumentStore } from "./document_store.js";
import type { DocumentLoader, SourceDocument } from "./document_source.js";
import { buildPrompt } from "./prompt_builder.js";
import type { Retriever } from "./retriever.js";

export type RequestState = "RECEIVED" | "INGESTING" | "READY" | "ANSWERING" | "COMPLETED" | "FAILED";

/** A URL for the configured loader, or text that was already extracted. */
export type DocumentReference = string | SourceDocument;

export interface PipelineConfig {
  chunkSize: number;
  overlap: number;
  boundary?: BoundaryDetector;
  topK: number;
  maxTokens: number;
  temperature: number;
  contextBudget: number;
}

export type QuestionOutcome =
  | {
      status: "answered";
      question: string;
      answer: string;
      cached: boolean;
      chunks: ChunkReference[];
    }
  | {
      status: "failed";
      question: string;
      /** Error marker shown in place of an answer. */
      answer: string;
      error: { code: PipelineErrorCode; message: string };
    };

export interface QueryReport {
  requestId: string;
  documentId: string;
  state: "COMPLETED";
  transitions: RequestState[];
  outcomes: QuestionOutcome[];
  latencyMs: number;
}

export interface RunOptions {
  requestId?: string;
  /** Overall request deadline; defaults to the orchestrator's. */
  deadlineMs?: number;
  signal?: AbortSignal;
  /** Per-request overrides of the pipeline config. */
  config?: Partial<PipelineConfig>;
}

export interface QueryOrchestratorDeps {
  store: DocumentStore;
  retriever: Retriever;
  generator: AnswerGenerator;
  cache: AnswerCache;
  config: PipelineConfig;
  requestTimeoutMs: number;
  loader?: DocumentLoader;
  events?: EventBus;
}

export const NO_RELEVANT_INFORMATION = "No relevant information found in the document for this question.";

export const errorMarker = (message: string) => `Error processing question: ${message}`;

export class QueryOrchestrator {
  constructor(private readonly deps: QueryOrchestratorDeps) {}

  /** `answer_questions`: one answer string (or error marker) per question, in order. */
  async answerQuestions(
    reference: DocumentReference,
    questions: readonly string[],
    options: RunOptions = {}
  ): Promise<string[]> {
    const report = await this.run(reference, questions, options);
    return report.outcomes.map((outcome) => outcome.answer);
  }

  async run(
    reference: DocumentReference,
    questions: readonly string[],
    options: RunOptions = {}
  ): Promise<QueryReport> {
    const started = Date.now();
    const requestId = options.requestId ?? uuid();
    const config = { ...this.deps.config, ...options.config };
    const transitions: RequestState[] = ["RECEIVED"];
    const deadline = createDeadline(options.deadlineMs ?? this.deps.requestTimeoutMs, options.signal);
    let documentId: string | undefined;

    try {
      let document: DocumentIndex;
      try {
        const source = await raceAbort(this.resolve(reference, deadline.signal), deadline.signal);
        documentId = source.documentId;

        const ingestConfig = { chunkSize: config.chunkSize, overlap: config.overlap, boundary: config.boundary };
        const cached = this.deps.store.get(source.documentId);
        if (!cached || cached.configFingerprint !== this.deps.store.fingerprint(ingestConfig)) {
          transitions.push("INGESTING");
        }
        // shared build: this request's deadline stops waiting, not the build
        document = await raceAbort(
          this.deps.store.ingest(source.documentId, source.text, ingestConfig, {
            requestId,
            source: source.source,
          }),
          deadline.signal
        );
        transitions.push("READY");
      } catch (err) {
        transitions.push("FAILED");
        const error = toPipelineError(err);
        this.deps.events?.emit({
          type: "request_completed",
          requestId,
          documentId,
          questionCount: questions.length,
          failedCount: questions.length,
          latencyMs: Date.now() - started,
          state: "FAILED",
        });
        throw error;
      }

      transitions.push("ANSWERING");
      const configIdentity = this.configIdentity(config);
      const outcomes = await Promise.all(
        questions.map((question) =>
          this.answerOne(document, question, config, configIdentity, requestId, deadline.signal)
        )
      );
      transitions.push("COMPLETED");

      const latencyMs = Date.now() - started;
      this.deps.events?.emit({
        type: "request_completed",
        requestId,
        documentId: document.documentId,
        questionCount: questions.length,
        failedCount: outcomes.filter((o) => o.status === "failed").length,
        latencyMs,
        state: "COMPLETED",
      });

      return { requestId, documentId: document.documentId, state: "COMPLETED", transitions, outcomes, latencyMs };
    } finally {
      deadline.dispose();
    }
  }

  /** Drops the document's index and every cached answer for it. */
  invalidateDocument(documentId: string): { indexEvicted: boolean; answersRemoved: number } {
    return {
      indexEvicted: this.deps.store.evict(documentId),
      answersRemoved: this.deps.cache.invalidate(documentId),
    };
  }

  /** Everything that could change an answer besides the document and question. */
  configIdentity(config: PipelineConfig): string {
    return stableHash({
      index: this.deps.store.fingerprint(config),
      topK: config.topK,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      contextBudget: config.contextBudget,
      generationModel: this.deps.generator.modelId,
    });
  }

  private async resolve(reference: DocumentReference, signal: AbortSignal): Promise<SourceDocument> {
    if (typeof reference !== "string") return reference;
    if (!this.deps.loader) {
      throw new DocumentIngestionFailedError("No document loader configured for URL references");
    }
    return this.deps.loader.load(reference, signal);
  }

  private async answerOne(
    document: DocumentIndex,
    question: string,
    config: PipelineConfig,
    configIdentity: string,
    requestId: string,
    signal: AbortSignal
  ): Promise<QuestionOutcome> {
    const { documentId } = document;
    const { events } = this.deps;
    const key = cacheKey({ documentId, question, configIdentity });

    try {
      const lookup = await raceAbort(
        this.deps.cache.getOrCompute(key, documentId, () =>
          this.compute(document, question, config, configIdentity, requestId, signal)
        ),
        signal
      );
      if (lookup.hit) events?.emit({ type: "cache_hit", requestId, documentId, question });

      return {
        status: "answered",
        question,
        answer: lookup.entry.answer,
        cached: lookup.hit,
        chunks: lookup.entry.chunks,
      };
    } catch (err) {
      const error = toPipelineError(err);
      events?.emit({
        type: "question_failed",
        requestId,
        documentId,
        question,
        errorCode: error.code,
        errorMessage: error.message,
      });
      return {
        status: "failed",
        question,
        answer: errorMarker(error.message),
        error: { code: error.code, message: error.message },
      };
    }
  }

  /** Cache miss path: retrieve → prompt → generate. */
  private async compute(
    document: DocumentIndex,
    question: string,
    config: PipelineConfig,
    configIdentity: string,
    requestId: string,
    signal: AbortSignal
  ): Promise<CacheEntryInput> {
    // a duplicate queued behind a failed first attempt may wake after the deadline
    signal.throwIfAborted();
    const { documentId } = document;
    const { events } = this.deps;
    events?.emit({ type: "cache_miss", requestId, documentId, question });

    const retrieval = await this.deps.retriever.retrieve(document, question, config.topK, signal);
    const scores = retrieval.chunks.map((hit) => hit.score);
    events?.emit({
      type: "retrieval_completed",
      requestId,
      documentId,
      question,
      latencyMs: retrieval.latencyMs,
      scores,
    });

    const base = {
      documentId,
      normalizedQuestion: normalizeQuestion(question),
      configIdentity,
    };
    if (retrieval.chunks.length === 0) {
      return { ...base, answer: NO_RELEVANT_INFORMATION, chunks: [] };
    }

    const built = buildPrompt(
      question,
      retrieval.chunks.map((hit) => hit.chunk),
      { contextBudget: config.contextBudget }
    );
    const generated = await this.deps.generator.generate(
      built.prompt,
      { maxTokens: config.maxTokens, temperature: config.temperature },
      signal
    );
    events?.emit({
      type: "generation_completed",
      requestId,
      documentId,
      question,
      answer: generated.answer,
      latencyMs: generated.latencyMs,
      truncated: generated.truncated,
      scores,
    });

    const included = new Set(built.included.map((chunk) => chunk.index));
    return {
      ...base,
      answer: generated.answer,
      chunks: retrieval.chunks
        .filter((hit) => included.has(hit.chunk.index))
        .map((hit) => ({
          index: hit.chunk.index,
          startOffset: hit.chunk.startOffset,
          endOffset: hit.chunk.endOffset,
          score: hit.score,
        })),
    };
  }
}
