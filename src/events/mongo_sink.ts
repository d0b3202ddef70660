import DocumentLog, { type IDocumentLog } from "../models/documentLog.js";
import QueryLog, { type IQueryLog } from "../models/queryLog.js";
import type { EventSink, PipelineEvent } from "./types.js";

/** The slice of a mongoose model this sink needs. */
export interface LogStore<T> {
  create(doc: T): Promise<unknown>;
}

export interface MongoSinkModels {
  documentLogs: LogStore<IDocumentLog>;
  queryLogs: LogStore<IQueryLog>;
}

const defaultModels: MongoSinkModels = {
  documentLogs: { create: (doc) => DocumentLog.create(doc) },
  queryLogs: { create: (doc) => QueryLog.create(doc) },
};

/**
 * Persists ingestion outcomes and answered/failed questions to MongoDB.
 * Cache hits are not logged as queries; they produced no new answer.
 */
export class MongoEventSink implements EventSink {
  readonly name = "mongo";

  constructor(private readonly models: MongoSinkModels = defaultModels) {}

  async handle(event: PipelineEvent): Promise<void> {
    switch (event.type) {
      case "ingestion_completed":
        await this.models.documentLogs.create({
          documentId: event.documentId,
          source: event.source,
          status: "success",
          chunkCount: event.chunkCount,
          processingTimeMs: event.latencyMs,
          configFingerprint: event.configFingerprint,
          requestId: event.requestId,
          createdAt: event.at,
        });
        return;
      case "ingestion_failed":
        await this.models.documentLogs.create({
          documentId: event.documentId,
          source: event.source,
          status: "error",
          processingTimeMs: event.latencyMs,
          errorMessage: event.errorMessage,
          configFingerprint: event.configFingerprint,
          requestId: event.requestId,
          createdAt: event.at,
        });
        return;
      case "generation_completed":
        await this.models.queryLogs.create({
          documentId: event.documentId,
          question: event.question,
          answer: event.answer,
          status: "answered",
          processingTimeMs: event.latencyMs,
          similarityScores: event.scores,
          truncated: event.truncated,
          requestId: event.requestId,
          createdAt: event.at,
        });
        return;
      case "question_failed":
        await this.models.queryLogs.create({
          documentId: event.documentId,
          question: event.question,
          status: "error",
          errorCode: event.errorCode,
          similarityScores: [],
          requestId: event.requestId,
          createdAt: event.at,
        });
        return;
      default:
        return;
    }
  }
}
