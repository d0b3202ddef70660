import type { EmbeddingBackend } from "../backends/types.js";
import { EmbeddingUnavailableError } from "../utils/errors.js";
import { moduleLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";

export type Vector = readonly number[];

export interface EmbedderOptions {
  batchSize: number;
  retry: { attempts: number; baseDelayMs: number };
}

const log = moduleLogger("embedder");

/** Scales to unit length so inner product equals cosine similarity. */
export function normalize(vector: readonly number[]): number[] {
  let sumSq = 0;
  for (const v of vector) sumSq += v * v;
  const norm = Math.sqrt(sumSq);
  if (norm === 0) return vector.map(() => 0);
  return vector.map((v) => v / norm);
}

/**
 * Wraps an embedding backend: splits input into batches, checks the shape of
 * every response (count, dimensionality, finite values) and L2-normalizes.
 * Malformed output counts as the backend being unavailable.
 */
export class Embedder {
  constructor(
    private readonly backend: EmbeddingBackend,
    private readonly options: EmbedderOptions
  ) {}

  get modelId(): string {
    return this.backend.modelId;
  }

  async embed(texts: readonly string[], signal?: AbortSignal): Promise<Vector[]> {
    const vectors: Vector[] = [];
    let dimension: number | undefined;

    for (let offset = 0; offset < texts.length; offset += this.options.batchSize) {
      const batch = texts.slice(offset, offset + this.options.batchSize);
      const raw = await withRetry(() => this.backend.embed(batch, { signal }), {
        ...this.options.retry,
        signal,
        onRetry: (err, attempt, delayMs) =>
          log.warn({ err, attempt, delayMs, batchSize: batch.length }, "Embedding batch failed, retrying"),
      });

      if (raw.length !== batch.length) {
        throw new EmbeddingUnavailableError(
          `Embedding backend returned ${raw.length} vectors for ${batch.length} inputs`
        );
      }

      for (const vector of raw) {
        dimension ??= vector.length;
        if (vector.length === 0 || vector.length !== dimension) {
          throw new EmbeddingUnavailableError(
            `Embedding dimension mismatch: expected ${dimension}, got ${vector.length}`
          );
        }
        if (!vector.every(Number.isFinite)) {
          throw new EmbeddingUnavailableError("Embedding backend returned non-finite values");
        }
        vectors.push(normalize(vector));
      }
    }

    return vectors;
  }

  async embedOne(text: string, signal?: AbortSignal): Promise<Vector> {
    const [vector] = await this.embed([text], signal);
    if (!vector) throw new EmbeddingUnavailableError("Embedding backend returned no vector");
    return vector;
  }
}
