import { EmbeddingUnavailableError } from "../utils/errors.js";
import type { Vector } from "./embedder.js";

export interface ScoredPosition {
  position: number;
  score: number;
}

/**
 * Flat (exact) inner-product index over L2-normalized vectors, stored in one
 * contiguous Float64Array. Built once in bulk; there is no single-vector insert.
 */
export class VectorIndex {
  private constructor(
    private readonly data: Float64Array,
    readonly size: number,
    readonly dimension: number
  ) {}

  static build(vectors: readonly Vector[]): VectorIndex {
    if (vectors.length === 0) return new VectorIndex(new Float64Array(0), 0, 0);

    const dimension = vectors[0].length;
    const data = new Float64Array(vectors.length * dimension);
    vectors.forEach((vector, row) => {
      if (vector.length !== dimension) {
        throw new EmbeddingUnavailableError(
          `Vector ${row} has dimension ${vector.length}, expected ${dimension}`
        );
      }
      data.set(vector, row * dimension);
    });
    return new VectorIndex(data, vectors.length, dimension);
  }

  /**
   * Top-k positions by descending score. `k` is clamped to the index size;
   * an empty index yields `[]`. Equal scores keep insertion order.
   */
  query(vector: Vector, k: number): ScoredPosition[] {
    if (this.size === 0 || k <= 0) return [];
    if (vector.length !== this.dimension) {
      throw new EmbeddingUnavailableError(
        `Query vector has dimension ${vector.length}, index expects ${this.dimension}`
      );
    }

    const scored: ScoredPosition[] = new Array(this.size);
    for (let row = 0; row < this.size; row++) {
      const base = row * this.dimension;
      let score = 0;
      for (let i = 0; i < this.dimension; i++) score += this.data[base + i] * vector[i];
      scored[row] = { position: row, score };
    }

    scored.sort((a, b) => b.score - a.score || a.position - b.position);
    return scored.slice(0, Math.min(k, this.size));
  }
}
