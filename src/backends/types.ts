/*-------------------------------------------------------------------
  External model backends: opaque remote functions the pipeline calls.
-------------------------------------------------------------------*/

export interface CallOptions {
  signal?: AbortSignal;
}

export interface EmbeddingBackend {
  /** Identity of the embedding model; part of every index/config fingerprint. */
  readonly modelId: string;
  /** One vector per input, same order. */
  embed(texts: string[], options?: CallOptions): Promise<number[][]>;
}

export interface GenerationParams extends CallOptions {
  maxTokens: number;
  temperature: number;
}

export interface GenerationOutput {
  text: string;
  /** Backend stopped on its token limit. */
  truncated: boolean;
}

export interface GenerationBackend {
  readonly modelId: string;
  generate(prompt: string, params: GenerationParams): Promise<GenerationOutput>;
}

export interface ModelBackends {
  embedding: EmbeddingBackend;
  generation: GenerationBackend;
}
