import type { Chunk } from "./chunker.js";
import type { DocumentIndex } from "./document_store.js";
import type { Embedder } from "./embedder.js";

export interface RetrievedChunk {
  chunk: Chunk;
  /** Cosine similarity to the question. */
  score: number;
  /** 1-based rank, best match first. */
  rank: number;
}

export interface RetrievalResult {
  documentId: string;
  question: string;
  chunks: RetrievedChunk[];
  latencyMs: number;
  cacheHit: boolean;
}

/**
 * Embeds the question and looks up the top-k chunks of one document.
 * Positions come straight from the index, so no chunk appears twice.
 */
export class Retriever {
  constructor(private readonly embedder: Embedder) {}

  async retrieve(
    document: DocumentIndex,
    question: string,
    k: number,
    signal?: AbortSignal
  ): Promise<RetrievalResult> {
    const started = Date.now();

    if (document.index.size === 0) {
      return { documentId: document.documentId, question, chunks: [], latencyMs: 0, cacheHit: false };
    }

    const queryVector = await this.embedder.embedOne(question, signal);
    const hits = document.index.query(queryVector, k);

    return {
      documentId: document.documentId,
      question,
      chunks: hits.map((hit, i) => ({
        chunk: document.chunks[hit.position],
        score: hit.score,
        rank: i + 1,
      })),
      latencyMs: Date.now() - started,
      cacheHit: false,
    };
  }
}
