import type { Chunk } from "./chunker.js";

export interface PromptConfig {
  /** Max characters of the joined context block. */
  contextBudget: number;
}

export interface BuiltPrompt {
  prompt: string;
  /** Chunks that made it into the context, in prompt order. */
  included: Chunk[];
  dropped: number;
}

const SECTION_SEPARATOR = "\n---\n";

export const INSUFFICIENT_CONTEXT_REPLY =
  "The provided document does not contain enough information to answer this question.";

const formatSection = (chunk: Chunk) => `Document Section:\n${chunk.text.trim()}\n`;

/**
 * Builds a grounded prompt. Chunks are given best match first; when the
 * context would exceed the budget, the lowest-ranked chunks are dropped whole.
 */
export function buildPrompt(question: string, chunks: readonly Chunk[], config: PromptConfig): BuiltPrompt {
  const included: Chunk[] = [];
  let used = 0;

  for (const chunk of chunks) {
    const cost = formatSection(chunk).length + (included.length > 0 ? SECTION_SEPARATOR.length : 0);
    if (used + cost > config.contextBudget) break;
    included.push(chunk);
    used += cost;
  }

  const context = included.map(formatSection).join(SECTION_SEPARATOR);

  const prompt = `You are an expert document analyst. Based on the provided document context, answer the following question accurately and concisely.

Question: ${question.trim()}

Document Context:
${context}

Instructions:
1. Answer based ONLY on the information provided in the context
2. If the context does not contain the answer, reply exactly: "${INSUFFICIENT_CONTEXT_REPLY}"
3. Provide a direct, factual answer in 1-3 sentences maximum
4. Do NOT use bullet points, lists, or extensive explanations
5. Do NOT mention chunk numbers, sections, or any document structure references
6. Start your answer directly with the factual information

Answer:`;

  return { prompt, included, dropped: chunks.length - included.length };
}
