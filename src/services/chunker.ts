/**
 * Chunker
 *
 * Splits raw document text into overlapping windows. The unit is the
 * character (UTF-16 code unit); offsets point into the original text,
 * so `text.slice(startOffset, endOffset) === chunk.text` always holds.
 *
 * Each chunk starts `overlap` characters before the previous one ended,
 * so adjacent chunks share exactly `overlap` characters and together cover
 * the whole document with no gaps.
 */

import { InvalidConfigurationError } from "../utils/errors.js";

export interface Chunk {
  documentId: string;
  /** 0-based ordinal within the document */
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
}

export interface ChunkOptions {
  chunkSize: number;
  overlap: number;
  /** Optional strategy to pull a window's end back to a natural break. */
  boundary?: BoundaryDetector;
}

/**
 * Picks a preferred end for the window `[start, end)`. Must return a value in
 * `(minEnd, end]`, or `undefined` to keep the hard window edge.
 */
export interface BoundaryDetector {
  readonly name: string;
  findBreak(text: string, minEnd: number, end: number): number | undefined;
}

/**
 * Prefers the end of the last sentence inside the window, then the last
 * whitespace. Only the second half of the window is searched so chunks
 * don't shrink to slivers.
 */
export const sentenceBoundary: BoundaryDetector = {
  name: "sentence",
  findBreak(text, minEnd, end) {
    const floor = Math.max(minEnd, end - Math.floor((end - minEnd) / 2));

    for (let i = end - 1; i >= floor; i--) {
      const ch = text[i];
      if ((ch === "." || ch === "!" || ch === "?") && (i + 1 >= text.length || /\s/.test(text[i + 1]))) {
        return i + 1 > minEnd ? i + 1 : undefined;
      }
      if (ch === "\n" && text[i - 1] === "\n") {
        return i + 1 > minEnd ? i + 1 : undefined;
      }
    }
    for (let i = end - 1; i >= floor; i--) {
      if (/\s/.test(text[i])) {
        return i + 1 > minEnd ? i + 1 : undefined;
      }
    }
    return undefined;
  },
};

export function validateChunkOptions({ chunkSize, overlap }: ChunkOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigurationError(`overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new InvalidConfigurationError(
      `overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
}

/**
 * Splits `text` into overlapping chunks. The last chunk may be shorter than
 * `chunkSize`; it is kept so the document is fully covered. Empty text gives
 * no chunks.
 */
export function splitText(documentId: string, text: string, options: ChunkOptions): Chunk[] {
  validateChunkOptions(options);
  const { chunkSize, overlap, boundary } = options;

  const chunks: Chunk[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);

    if (end < text.length && boundary) {
      // a break at or before start+overlap would stall the next window
      const preferred = boundary.findBreak(text, start + overlap, end);
      if (preferred !== undefined && preferred > start + overlap && preferred <= end) {
        end = preferred;
      }
    }

    chunks.push({
      documentId,
      index: chunks.length,
      text: text.slice(start, end),
      startOffset: start,
      endOffset: end,
    });

    if (end >= text.length) break;
    start = end - overlap;
  }

  return chunks;
}

export const boundaryFor = (name: "sentence" | "none"): BoundaryDetector | undefined =>
  name === "sentence" ? sentenceBoundary : undefined;
