import axios, { type AxiosInstance, isAxiosError, isCancel } from "axios";
import {
  EmbeddingUnavailableError,
  GenerationUnavailableError,
  TimeoutError,
} from "../utils/errors.js";
import type {
  CallOptions,
  EmbeddingBackend,
  GenerationBackend,
  GenerationOutput,
  GenerationParams,
  ModelBackends,
} from "./types.js";

export interface OllamaOptions {
  baseUrl: string;
  embeddingModel: string;
  generationModel: string;
  timeoutMs: number;
  /** Pre-built client; tests pass one with an in-process adapter. */
  http?: AxiosInstance;
}

interface OllamaEmbedResponse {
  embeddings?: unknown;
}

interface OllamaGenerateResponse {
  response?: unknown;
  done_reason?: string;
}

const describe = (err: unknown): string => {
  if (isAxiosError(err)) {
    if (err.response) return `HTTP ${err.response.status}`;
    return err.code ?? err.message;
  }
  return err instanceof Error ? err.message : String(err);
};

/**
 * Talks to a local Ollama server: `/api/embed` for vectors and
 * `/api/generate` (non-streaming) for completions.
 */
export class OllamaBackend {
  private readonly http: AxiosInstance;
  private readonly embeddingModel: string;
  private readonly generationModel: string;

  constructor(options: OllamaOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        headers: { "Content-Type": "application/json" },
      });
    this.embeddingModel = options.embeddingModel;
    this.generationModel = options.generationModel;
  }

  backends(): ModelBackends {
    return { embedding: this.embedder(), generation: this.generator() };
  }

  embedder(): EmbeddingBackend {
    return {
      modelId: `ollama:${this.embeddingModel}`,
      embed: (texts, options) => this.embed(texts, options),
    };
  }

  generator(): GenerationBackend {
    return {
      modelId: `ollama:${this.generationModel}`,
      generate: (prompt, params) => this.generate(prompt, params),
    };
  }

  async embed(texts: string[], options: CallOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return [];

    let data: OllamaEmbedResponse;
    try {
      const res = await this.http.post<OllamaEmbedResponse>(
        "/api/embed",
        { model: this.embeddingModel, input: texts },
        { signal: options.signal }
      );
      data = res.data;
    } catch (err) {
      if (isCancel(err)) throw new TimeoutError("Embedding call aborted", err);
      throw new EmbeddingUnavailableError(`Ollama embed failed: ${describe(err)}`, err);
    }

    if (!Array.isArray(data.embeddings)) {
      throw new EmbeddingUnavailableError("Ollama embed returned no embeddings array");
    }
    return data.embeddings.map((row: unknown, i: number) => {
      if (!Array.isArray(row) || !row.every((v): v is number => typeof v === "number")) {
        throw new EmbeddingUnavailableError(`Ollama embed returned a malformed vector at ${i}`);
      }
      return row;
    });
  }

  async generate(prompt: string, params: GenerationParams): Promise<GenerationOutput> {
    let data: OllamaGenerateResponse;
    try {
      const res = await this.http.post<OllamaGenerateResponse>(
        "/api/generate",
        {
          model: this.generationModel,
          prompt,
          stream: false,
          options: {
            temperature: params.temperature,
            num_predict: params.maxTokens,
            top_p: 0.9,
            top_k: 40,
          },
        },
        { signal: params.signal }
      );
      data = res.data;
    } catch (err) {
      if (isCancel(err)) throw new TimeoutError("Generation call aborted", err);
      throw new GenerationUnavailableError(`Ollama generate failed: ${describe(err)}`, err);
    }

    if (typeof data.response !== "string") {
      throw new GenerationUnavailableError("Ollama generate returned no response text");
    }
    return { text: data.response, truncated: data.done_reason === "length" };
  }
}
