/**
 * OpenAI backend
 *
 * Uses the AI SDK (`embedMany`, `generateText`) over the OpenAI provider.
 * SDK-level retries are switched off: the pipeline owns retry and backoff.
 *
 * Model options:
 * - "text-embedding-3-small" (1536 dims) or "text-embedding-3-large"
 *   with optional dimension reduction
 * - any chat model id for generation
 */

import { createOpenAI } from "@ai-sdk/openai";
import { embedMany, generateText } from "ai";
import {
  EmbeddingUnavailableError,
  GenerationUnavailableError,
  TimeoutError,
  errorMessage,
} from "../utils/errors.js";
import type { EmbeddingBackend, GenerationBackend, ModelBackends } from "./types.js";

export interface OpenAIOptions {
  apiKey: string;
  embeddingModel: string;
  generationModel: string;
  /** Dimension reduction for text-embedding-3-* models. */
  dimensions?: number;
  /** OpenAI-compatible endpoint (Azure, a proxy or a local gateway). */
  baseURL?: string;
  fetch?: typeof globalThis.fetch;
}

const isAbort = (err: unknown): boolean =>
  err instanceof Error && (err.name === "AbortError" || err.name === "ResponseAborted");

export function createOpenAIBackends(options: OpenAIOptions): ModelBackends {
  const openai = createOpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, fetch: options.fetch });
  const embeddingModel = openai.embedding(options.embeddingModel, {
    dimensions: options.dimensions,
  });
  const chatModel = openai(options.generationModel);

  const embedding: EmbeddingBackend = {
    modelId: `openai:${options.embeddingModel}${options.dimensions ? `@${options.dimensions}` : ""}`,
    async embed(texts, callOptions = {}) {
      if (texts.length === 0) return [];
      try {
        const { embeddings } = await embedMany({
          model: embeddingModel,
          values: texts,
          maxRetries: 0,
          abortSignal: callOptions.signal,
        });
        return embeddings;
      } catch (err) {
        if (isAbort(err)) throw new TimeoutError("Embedding call aborted", err);
        throw new EmbeddingUnavailableError(`OpenAI embed failed: ${errorMessage(err)}`, err);
      }
    },
  };

  const generation: GenerationBackend = {
    modelId: `openai:${options.generationModel}`,
    async generate(prompt, params) {
      try {
        const result = await generateText({
          model: chatModel,
          prompt,
          maxTokens: params.maxTokens,
          temperature: params.temperature,
          maxRetries: 0,
          abortSignal: params.signal,
        });
        return { text: result.text, truncated: result.finishReason === "length" };
      } catch (err) {
        if (isAbort(err)) throw new TimeoutError("Generation call aborted", err);
        throw new GenerationUnavailableError(`OpenAI generate failed: ${errorMessage(err)}`, err);
      }
    },
  };

  return { embedding, generation };
}
