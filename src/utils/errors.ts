/*-------------------------------------------------------------------
  Pipeline error taxonomy
-------------------------------------------------------------------*/

export type PipelineErrorCode =
  | "INVALID_CONFIGURATION"
  | "EMBEDDING_UNAVAILABLE"
  | "GENERATION_UNAVAILABLE"
  | "DOCUMENT_INGESTION_FAILED"
  | "TIMEOUT"
  | "INTERNAL";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly retryable: boolean;

  constructor(
    code: PipelineErrorCode,
    message: string,
    options: { retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

/** Bad chunk/overlap or other settings. Fatal: fix the configuration before retrying. */
export class InvalidConfigurationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("INVALID_CONFIGURATION", message, { cause });
  }
}

export class EmbeddingUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("EMBEDDING_UNAVAILABLE", message, { retryable: true, cause });
  }
}

export class GenerationUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("GENERATION_UNAVAILABLE", message, { retryable: true, cause });
  }
}

/** Fetch/parse failure upstream of the core. Aborts the whole request. */
export class DocumentIngestionFailedError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("DOCUMENT_INGESTION_FAILED", message, { cause });
  }
}

export class TimeoutError extends PipelineError {
  constructor(message = "Deadline exceeded", cause?: unknown) {
    super("TIMEOUT", message, { cause });
  }
}

export const isPipelineError = (err: unknown): err is PipelineError =>
  err instanceof PipelineError;

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/** Wraps anything thrown into a PipelineError, keeping typed errors as they are. */
export function toPipelineError(err: unknown): PipelineError {
  if (isPipelineError(err)) return err;
  return new PipelineError("INTERNAL", errorMessage(err), { cause: err });
}
