// Paper Script Pipeline - Semantic fact checker
//
// Scores generated text against its source:
//   1. Chunk both texts with the same chunk size.
//   2. Embed generated chunks then source chunks in ONE gateway call.
//   3. For each generated chunk, find the best-scoring source chunk.
//   4. Classify each chunk (VALID above validThreshold) and the whole report
//      (PASSED when the mean score is above passThreshold).
//
// Gateway failures propagate unchanged; no partial report is produced.
// A dimension mismatch on any pair aborts the whole call.

import { DEFAULT_FACT_CHECK_OPTIONS } from "./config.js";
import type { EmbeddingGateway } from "./embedding-gateway.js";
import { ServiceError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logging.js";
import { cosineSimilarity } from "./similarity.js";
import { chunkText } from "./text-chunker.js";
import type { Chunk, ChunkValidation, FactCheckOptions, ValidationReport } from "./types.js";

export interface BestMatch {
  score: number;
  /** -1 when no candidate scored above zero. */
  index: number;
}

/**
 * Find the candidate with the highest similarity to `target`.
 *
 * The running best starts at score 0 with no match, and only a strictly
 * greater score replaces it, so ties keep the first-seen candidate and a
 * target with no positive score reports { score: 0, index: -1 }.
 */
export function findBestMatch(target: readonly number[], candidates: readonly number[][]): BestMatch {
  let best: BestMatch = { score: 0, index: -1 };
  for (let j = 0; j < candidates.length; j++) {
    const score = cosineSimilarity(target, candidates[j]);
    if (score > best.score) {
      best = { score, index: j };
    }
  }
  return best;
}

export class FactChecker {
  private readonly embeddings: EmbeddingGateway;
  private readonly defaults: FactCheckOptions;
  private readonly logger: Logger;

  constructor(
    embeddings: EmbeddingGateway,
    options: Partial<FactCheckOptions> = {},
    logger: Logger = createConsoleLogger("FactChecker"),
  ) {
    this.embeddings = embeddings;
    this.defaults = { ...DEFAULT_FACT_CHECK_OPTIONS, ...options };
    this.logger = logger;
  }

  async validate(
    generatedText: string,
    sourceText: string,
    options: Partial<FactCheckOptions> = {},
  ): Promise<ValidationReport> {
    const { chunkSize, validThreshold, passThreshold } = { ...this.defaults, ...options };

    const generatedChunks = chunkText(generatedText, chunkSize, "generated");
    const sourceChunks = chunkText(sourceText, chunkSize, "source");

    if (generatedChunks.length === 0) {
      this.logger.warn("Generated text is empty, nothing to validate");
      return {
        overallSimilarity: 0,
        status: "FAILED",
        chunkValidations: [],
        factualAccuracy: 0,
        embeddingModel: null,
        degraded: null,
      };
    }

    this.logger.info(
      `Embedding ${generatedChunks.length} generated + ${sourceChunks.length} source chunks (chunk size ${chunkSize} words)`,
    );

    const allChunks: Chunk[] = [...generatedChunks, ...sourceChunks];
    const outcome = await this.embeddings.embed(allChunks.map((c) => c.text));
    const { vectors, modelId } = outcome.value;

    if (vectors.length !== allChunks.length) {
      throw new ServiceError(
        "embedding",
        `Embedding gateway returned ${vectors.length} vectors for ${allChunks.length} chunks`,
      );
    }
    if (outcome.status === "degraded") {
      this.logger.warn(`Scoring against substituted embeddings: ${outcome.reason}`);
    }

    const generatedVectors = vectors.slice(0, generatedChunks.length);
    const sourceVectors = vectors.slice(generatedChunks.length);

    const chunkValidations: ChunkValidation[] = generatedChunks.map((chunk, i) => {
      const best = findBestMatch(generatedVectors[i], sourceVectors);
      return {
        generatedChunk: chunk,
        bestMatch: best.index >= 0 ? sourceChunks[best.index] : null,
        similarityScore: best.score,
        status: best.score > validThreshold ? "VALID" : "NEEDS_REVIEW",
      };
    });

    const overallSimilarity =
      chunkValidations.reduce((sum, v) => sum + v.similarityScore, 0) / chunkValidations.length;
    const status = overallSimilarity > passThreshold ? "PASSED" : "FAILED";

    this.logger.info(
      `Validation ${status}: mean similarity ${overallSimilarity.toFixed(3)}, ${chunkValidations.filter((v) => v.status === "VALID").length}/${chunkValidations.length} chunks valid`,
    );

    return {
      overallSimilarity,
      status,
      chunkValidations,
      factualAccuracy: overallSimilarity * 100,
      embeddingModel: modelId,
      degraded: outcome.status === "degraded" ? { reason: outcome.reason } : null,
    };
  }
}
