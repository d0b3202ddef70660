import type { GenerationBackend } from "../backends/types.js";
import { GenerationUnavailableError } from "../utils/errors.js";
import { moduleLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import { cleanAnswer } from "./answer_cleaner.js";

export interface GenerationConfig {
  maxTokens: number;
  temperature: number;
}

export interface GeneratedAnswer {
  answer: string;
  truncated: boolean;
  latencyMs: number;
}

const log = moduleLogger("answer_generator");

/** Calls the generation backend with bounded retry and cleans the reply. */
export class AnswerGenerator {
  constructor(
    private readonly backend: GenerationBackend,
    private readonly retry: { attempts: number; baseDelayMs: number }
  ) {}

  get modelId(): string {
    return this.backend.modelId;
  }

  async generate(prompt: string, config: GenerationConfig, signal?: AbortSignal): Promise<GeneratedAnswer> {
    const started = Date.now();

    const output = await withRetry(
      async () => {
        const result = await this.backend.generate(prompt, { ...config, signal });
        const answer = cleanAnswer(result.text);
        if (!answer) throw new GenerationUnavailableError("Generation backend returned an empty answer");
        return { answer, truncated: result.truncated };
      },
      {
        ...this.retry,
        signal,
        onRetry: (err, attempt, delayMs) => log.warn({ err, attempt, delayMs }, "Generation failed, retrying"),
      }
    );

    return { ...output, latencyMs: Date.now() - started };
  }
}
