import { describe, it, expect } from "vitest";
import { loadSettings } from "../../src/config/settings.js";
import { InvalidConfigurationError } from "../../src/utils/errors.js";

describe("loadSettings", () => {
  it("should apply defaults to an empty environment", () => {
    const settings = loadSettings({});

    expect(settings.port).toBe(3000);
    expect(settings.chunking).toEqual({ chunkSize: 1000, overlap: 200, boundary: "sentence" });
    expect(settings.retrieval.topK).toBe(5);
    expect(settings.generation).toEqual({ maxTokens: 4000, temperature: 0.1, contextBudget: 12000 });
    expect(settings.cache).toEqual({ capacity: 1000, ttlMs: 3_600_000 });
    expect(settings.models.provider).toBe("ollama");
    expect(settings.apiToken).toBeUndefined();
    expect(settings.corsOrigins).toEqual([]);
  });

  it("should coerce numeric strings and split origins", () => {
    const settings = loadSettings({
      PORT: "8080",
      CHUNK_SIZE: "400",
      CHUNK_OVERLAP: "40",
      TEMPERATURE: "0.5",
      API_TOKEN: "test-secret",
      CORS_ORIGINS: "http://localhost:5173, https://app.example.com",
    });

    expect(settings.port).toBe(8080);
    expect(settings.chunking.chunkSize).toBe(400);
    expect(settings.chunking.overlap).toBe(40);
    expect(settings.generation.temperature).toBe(0.5);
    expect(settings.apiToken).toBe("test-secret");
    expect(settings.corsOrigins).toEqual(["http://localhost:5173", "https://app.example.com"]);
  });

  it("should list every invalid variable at once", () => {
    expect(() => loadSettings({ CHUNK_SIZE: "abc", MODEL_PROVIDER: "nope" })).toThrow(
      /MODEL_PROVIDER: .*; CHUNK_SIZE: /
    );
  });

  it("should reject an overlap as large as the chunk size", () => {
    expect(() => loadSettings({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(
      new InvalidConfigurationError("CHUNK_OVERLAP (100) must be smaller than CHUNK_SIZE (100)")
    );
  });

  it("should require a key for the openai provider", () => {
    expect(() => loadSettings({ MODEL_PROVIDER: "openai" })).toThrow(InvalidConfigurationError);
    expect(loadSettings({ MODEL_PROVIDER: "openai", OPENAI_API_KEY: "test-secret" }).models.openaiApiKey).toBe(
      "test-secret"
    );
  });

  it("should read the optional openai endpoint and embedding size", () => {
    const { models } = loadSettings({
      MODEL_PROVIDER: "openai",
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "https://gateway.test/v1",
      EMBEDDING_DIMENSIONS: "512",
    });

    expect(models.openaiBaseUrl).toBe("https://gateway.test/v1");
    expect(models.embeddingDimensions).toBe(512);
    expect(loadSettings({}).models.embeddingDimensions).toBeUndefined();
    expect(() => loadSettings({ EMBEDDING_DIMENSIONS: "0" })).toThrow(/EMBEDDING_DIMENSIONS: /);
  });
});
