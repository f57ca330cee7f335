// Paper Script Pipeline - Similarity scorer

import { DimensionMismatchError } from "./errors.js";

// ─── Cosine Similarity ──────────────────────────────────────────────────────────

/**
 * Compute cosine similarity between two vectors of equal dimension.
 *
 * Returns dot(a, b) / (norm(a) * norm(b)), or 0 when either vector has zero
 * magnitude. Vectors of different lengths are a gateway/config contract
 * violation and throw DimensionMismatchError; nothing is truncated.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
