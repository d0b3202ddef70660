import { describe, it, expect } from "vitest";
import { VectorIndex } from "../../src/services/vector_index.js";
import { EmbeddingUnavailableError } from "../../src/utils/errors.js";

describe("VectorIndex", () => {
  const index = VectorIndex.build([
    [1, 0],
    [0, 1],
    [0.6, 0.8],
    [1, 0],
  ]);

  it("should rank by inner product, best first", () => {
    expect(index.query([0, 1], 2)).toEqual([
      { position: 1, score: 1 },
      { position: 2, score: 0.8 },
    ]);
  });

  it("should break ties by lower position", () => {
    expect(index.query([1, 0], 2).map((hit) => hit.position)).toEqual([0, 3]);
  });

  it("should clamp k to the index size", () => {
    expect(index.query([1, 0], 10)).toHaveLength(4);
    expect(index.query([1, 0], 0)).toEqual([]);
  });

  it("should answer the same way on repeated queries", () => {
    expect(index.query([0.6, 0.8], 3)).toEqual(index.query([0.6, 0.8], 3));
  });

  it("should return nothing from an empty index", () => {
    const empty = VectorIndex.build([]);
    expect(empty.size).toBe(0);
    expect(empty.query([1, 0], 3)).toEqual([]);
  });

  it("should reject vectors of mixed dimension", () => {
    expect(() => VectorIndex.build([[1, 0], [1, 0, 0]])).toThrow(EmbeddingUnavailableError);
  });

  it("should reject a query of the wrong dimension", () => {
    expect(() => index.query([1, 0, 0], 1)).toThrow("Query vector has dimension 3, index expects 2");
  });

  it("should take its dimension from the first vector", () => {
    expect(index.dimension).toBe(2);
    expect(index.size).toBe(4);
  });
});
