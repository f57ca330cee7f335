// Paper Script Pipeline - Text chunker
// Splits text into consecutive runs of N whitespace-delimited words.
// Chunk boundaries always fall between words.

import type { Chunk, ChunkSourceKind } from "./types.js";

/** Split on whitespace runs, dropping empty tokens from leading/trailing space. */
export function splitWords(text: string): string[] {
  const trimmed = text.trim();
  if (trimmed.length === 0) return [];
  return trimmed.split(/\s+/);
}

/** Collapse every whitespace run to a single space and trim. */
export function normalizeWhitespace(text: string): string {
  return splitWords(text).join(" ");
}

/**
 * Group the words of `text` into chunks of exactly `chunkSizeInWords` words;
 * the final chunk may be shorter. Empty or whitespace-only text yields [].
 *
 * Space-joining the returned chunk texts reproduces normalizeWhitespace(text).
 */
export function chunkText(
  text: string,
  chunkSizeInWords: number,
  sourceKind: ChunkSourceKind = "source",
): Chunk[] {
  if (!Number.isInteger(chunkSizeInWords) || chunkSizeInWords < 1) {
    throw new RangeError(`chunkSizeInWords must be a positive integer, got ${chunkSizeInWords}`);
  }

  const words = splitWords(text);
  const chunks: Chunk[] = [];
  for (let start = 0; start < words.length; start += chunkSizeInWords) {
    chunks.push({
      sourceKind,
      index: chunks.length,
      text: words.slice(start, start + chunkSizeInWords).join(" "),
    });
  }
  return chunks;
}
