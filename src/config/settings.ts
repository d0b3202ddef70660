import { z } from "zod";
import { InvalidConfigurationError } from "../utils/errors.js";

/* ────────────────────────────────────  env schema  ─────────── */
const int = (fallback: number) => z.coerce.number().int().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: int(3000).pipe(z.number().min(0).max(65535)),
  LOG_LEVEL: z.string().default("info"),
  API_TOKEN: z.string().min(1).optional(),
  MONGODB_URL: z.string().url().optional(),
  CORS_ORIGINS: z
    .string()
    .default("")
    .transform((raw) => raw.split(",").map((origin) => origin.trim()).filter(Boolean)),

  MODEL_PROVIDER: z.enum(["ollama", "openai"]).default("ollama"),
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  EMBEDDING_MODEL: z.string().min(1).default("all-minilm"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
  LLM_MODEL: z.string().min(1).default("llama3"),

  CHUNK_SIZE: int(1000).pipe(z.number().positive()),
  CHUNK_OVERLAP: int(200).pipe(z.number().nonnegative()),
  CHUNK_BOUNDARY: z.enum(["sentence", "none"]).default("sentence"),
  TOP_K_RESULTS: int(5).pipe(z.number().positive()),
  MAX_TOKENS: int(4000).pipe(z.number().positive()),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  PROMPT_CONTEXT_BUDGET: int(12000).pipe(z.number().positive()),
  EMBED_BATCH_SIZE: int(32).pipe(z.number().positive()),

  CACHE_CAPACITY: int(1000).pipe(z.number().positive()),
  CACHE_TTL_MS: int(60 * 60 * 1000).pipe(z.number().nonnegative()),
  MAX_INDEXED_DOCUMENTS: int(16).pipe(z.number().positive()),

  RETRY_ATTEMPTS: int(3).pipe(z.number().positive()),
  RETRY_BASE_DELAY_MS: int(250).pipe(z.number().nonnegative()),
  BACKEND_TIMEOUT_MS: int(60_000).pipe(z.number().positive()),
  REQUEST_TIMEOUT_MS: int(120_000).pipe(z.number().positive()),
  MAX_DOCUMENT_BYTES: int(10 * 1024 * 1024).pipe(z.number().positive()),
});

export type Env = z.infer<typeof envSchema>;

/* ────────────────────────────────────  typed settings  ─────── */
export interface Settings {
  env: Env["NODE_ENV"];
  port: number;
  logLevel: string;
  apiToken?: string;
  mongoUrl?: string;
  /** Browser origins allowed by CORS; empty allows any. */
  corsOrigins: string[];
  models: {
    provider: Env["MODEL_PROVIDER"];
    ollamaBaseUrl: string;
    openaiApiKey?: string;
    openaiBaseUrl?: string;
    embeddingModel: string;
    /** OpenAI only: reduced output size for text-embedding-3-* models. */
    embeddingDimensions?: number;
    generationModel: string;
    timeoutMs: number;
  };
  chunking: {
    chunkSize: number;
    overlap: number;
    boundary: Env["CHUNK_BOUNDARY"];
  };
  retrieval: { topK: number };
  generation: { maxTokens: number; temperature: number; contextBudget: number };
  embedding: { batchSize: number };
  cache: { capacity: number; ttlMs: number };
  store: { maxDocuments: number };
  retry: { attempts: number; baseDelayMs: number };
  requestTimeoutMs: number;
  maxDocumentBytes: number;
}

/**
 * Parses and validates the raw environment. Every problem is reported at once
 * so a bad deploy shows the whole list instead of the first miss.
 */
export function loadSettings(source: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigurationError(`Invalid environment: ${problems}`, parsed.error);
  }

  const env = parsed.data;
  if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
    throw new InvalidConfigurationError(
      `CHUNK_OVERLAP (${env.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${env.CHUNK_SIZE})`
    );
  }
  if (env.MODEL_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
    throw new InvalidConfigurationError("OPENAI_API_KEY is required when MODEL_PROVIDER=openai");
  }

  return Object.freeze({
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    apiToken: env.API_TOKEN,
    mongoUrl: env.MONGODB_URL,
    corsOrigins: env.CORS_ORIGINS,
    models: {
      provider: env.MODEL_PROVIDER,
      ollamaBaseUrl: env.OLLAMA_BASE_URL,
      openaiApiKey: env.OPENAI_API_KEY,
      openaiBaseUrl: env.OPENAI_BASE_URL,
      embeddingModel: env.EMBEDDING_MODEL,
      embeddingDimensions: env.EMBEDDING_DIMENSIONS,
      generationModel: env.LLM_MODEL,
      timeoutMs: env.BACKEND_TIMEOUT_MS,
    },
    chunking: {
      chunkSize: env.CHUNK_SIZE,
      overlap: env.CHUNK_OVERLAP,
      boundary: env.CHUNK_BOUNDARY,
    },
    retrieval: { topK: env.TOP_K_RESULTS },
    generation: {
      maxTokens: env.MAX_TOKENS,
      temperature: env.TEMPERATURE,
      contextBudget: env.PROMPT_CONTEXT_BUDGET,
    },
    embedding: { batchSize: env.EMBED_BATCH_SIZE },
    cache: { capacity: env.CACHE_CAPACITY, ttlMs: env.CACHE_TTL_MS },
    store: { maxDocuments: env.MAX_INDEXED_DOCUMENTS },
    retry: { attempts: env.RETRY_ATTEMPTS, baseDelayMs: env.RETRY_BASE_DELAY_MS },
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    maxDocumentBytes: env.MAX_DOCUMENT_BYTES,
  });
}
