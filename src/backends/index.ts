import type { Settings } from "../config/settings.js";
import { InvalidConfigurationError } from "../utils/errors.js";
import { OllamaBackend } from "./ollama.js";
import { createOpenAIBackends } from "./openai.js";
import type { ModelBackends } from "./types.js";

export type * from "./types.js";

/** Picks the concrete provider named in settings. */
export function createModelBackends(models: Settings["models"]): ModelBackends {
  switch (models.provider) {
    case "openai":
      if (!models.openaiApiKey) {
        throw new InvalidConfigurationError("OPENAI_API_KEY is required for the openai provider");
      }
      return createOpenAIBackends({
        apiKey: models.openaiApiKey,
        embeddingModel: models.embeddingModel,
        generationModel: models.generationModel,
        dimensions: models.embeddingDimensions,
        baseURL: models.openaiBaseUrl,
      });
    case "ollama":
      return new OllamaBackend({
        baseUrl: models.ollamaBaseUrl,
        embeddingModel: models.embeddingModel,
        generationModel: models.generationModel,
        timeoutMs: models.timeoutMs,
      }).backends();
  }
}
