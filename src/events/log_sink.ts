import type { Logger } from "pino";
import { moduleLogger } from "../utils/logger.js";
import type { EventSink, PipelineEvent } from "./types.js";

const preview = (text: string, max = 100) => (text.length > max ? `${text.slice(0, max)}…` : text);

/** Writes every pipeline event to the service log. */
export class LogEventSink implements EventSink {
  readonly name = "log";

  constructor(private readonly log: Logger = moduleLogger("pipeline")) {}

  handle(event: PipelineEvent): void {
    const { requestId } = event;

    switch (event.type) {
      case "ingestion_started":
        this.log.info({ requestId, documentId: event.documentId, source: event.source }, "Ingesting document");
        break;
      case "ingestion_completed":
        this.log.info(
          { requestId, documentId: event.documentId, chunkCount: event.chunkCount, latencyMs: event.latencyMs },
          "Document indexed"
        );
        break;
      case "ingestion_failed":
        this.log.error(
          { requestId, documentId: event.documentId, code: event.errorCode, latencyMs: event.latencyMs },
          `Ingestion failed: ${event.errorMessage}`
        );
        break;
      case "cache_hit":
      case "cache_miss":
        this.log.debug(
          { requestId, documentId: event.documentId, question: preview(event.question) },
          event.type === "cache_hit" ? "Answer cache hit" : "Answer cache miss"
        );
        break;
      case "retrieval_completed":
        this.log.debug(
          { requestId, latencyMs: event.latencyMs, topScore: event.scores[0] ?? null, hits: event.scores.length },
          "Retrieved chunks"
        );
        break;
      case "generation_completed":
        if (event.truncated) {
          this.log.warn({ requestId, question: preview(event.question) }, "Generation hit the token limit");
        }
        this.log.info(
          { requestId, latencyMs: event.latencyMs, answer: preview(event.answer, 200) },
          "Generated answer"
        );
        break;
      case "question_failed":
        this.log.warn(
          { requestId, question: preview(event.question), code: event.errorCode },
          `Question failed: ${event.errorMessage}`
        );
        break;
      case "request_completed":
        this.log.info(
          {
            requestId,
            documentId: event.documentId,
            questionCount: event.questionCount,
            failedCount: event.failedCount,
            latencyMs: event.latencyMs,
            state: event.state,
          },
          "Request finished"
        );
        break;
    }
  }
}
