/*-------------------------------------------------------------------
  Structured pipeline events, handed to sinks for logging/persistence.
-------------------------------------------------------------------*/

interface EventBase {
  at: Date;
  requestId?: string;
}

export interface IngestionStartedEvent extends EventBase {
  type: "ingestion_started";
  documentId: string;
  source?: string;
  configFingerprint: string;
}

export interface IngestionCompletedEvent extends EventBase {
  type: "ingestion_completed";
  documentId: string;
  source?: string;
  configFingerprint: string;
  chunkCount: number;
  latencyMs: number;
}

export interface IngestionFailedEvent extends EventBase {
  type: "ingestion_failed";
  documentId: string;
  source?: string;
  configFingerprint: string;
  latencyMs: number;
  errorCode: string;
  errorMessage: string;
}

export interface CacheHitEvent extends EventBase {
  type: "cache_hit";
  documentId: string;
  question: string;
}

export interface CacheMissEvent extends EventBase {
  type: "cache_miss";
  documentId: string;
  question: string;
}

export interface RetrievalCompletedEvent extends EventBase {
  type: "retrieval_completed";
  documentId: string;
  question: string;
  latencyMs: number;
  scores: number[];
}

export interface GenerationCompletedEvent extends EventBase {
  type: "generation_completed";
  documentId: string;
  question: string;
  answer: string;
  latencyMs: number;
  truncated: boolean;
  scores: number[];
}

export interface QuestionFailedEvent extends EventBase {
  type: "question_failed";
  documentId: string;
  question: string;
  errorCode: string;
  errorMessage: string;
}

export interface RequestCompletedEvent extends EventBase {
  type: "request_completed";
  documentId?: string;
  questionCount: number;
  failedCount: number;
  latencyMs: number;
  state: "COMPLETED" | "FAILED";
}

export type PipelineEvent =
  | IngestionStartedEvent
  | IngestionCompletedEvent
  | IngestionFailedEvent
  | CacheHitEvent
  | CacheMissEvent
  | RetrievalCompletedEvent
  | GenerationCompletedEvent
  | QuestionFailedEvent
  | RequestCompletedEvent;

/** Distributes `Omit` over the union so each variant keeps its own fields. */
export type EventInput = PipelineEvent extends infer E
  ? E extends PipelineEvent
    ? Omit<E, "at"> & { at?: Date }
    : never
  : never;

export interface EventSink {
  readonly name: string;
  handle(event: PipelineEvent): void | Promise<void>;
  /** Waits for pending writes; called on shutdown. */
  flush?(): Promise<void>;
}
