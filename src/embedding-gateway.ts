// Paper Script Pipeline - Embedding gateway
// Maps an ordered list of texts to vectors of one configured dimension,
// positionally aligned with the input.

import { createHash } from "node:crypto";
import { ServiceError, errorMessage } from "./errors.js";
import { statusCodeOf } from "./generation-gateway.js";
import type { Logger } from "./logging.js";
import type { EmbeddingResponse, Outcome } from "./types.js";

export interface EmbeddingGateway {
  readonly modelId: string;
  readonly dimension: number;
  embed(texts: string[]): Promise<Outcome<EmbeddingResponse>>;
}

// ─── OpenAI embeddings client interface ─────────────────────────────────────────

/**
 * Minimal interface for the embeddings API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIEmbeddingClient {
  embeddings: {
    create(params: {
      model: string;
      input: string[];
      encoding_format: "float";
    }): Promise<{
      model?: string;
      data: Array<{
        embedding: number[];
        index: number;
      }>;
    }>;
  };
}

// ─── OpenAIEmbeddingGateway ─────────────────────────────────────────────────────

export class OpenAIEmbeddingGateway implements EmbeddingGateway {
  readonly modelId: string;
  readonly dimension: number;
  private readonly client: OpenAIEmbeddingClient;

  constructor(client: OpenAIEmbeddingClient, modelId: string, dimension: number) {
    this.client = client;
    this.modelId = modelId;
    this.dimension = dimension;
  }

  async embed(texts: string[]): Promise<Outcome<EmbeddingResponse>> {
    if (texts.length === 0) {
      return { status: "success", value: { vectors: [], modelId: this.modelId } };
    }

    let response: Awaited<ReturnType<OpenAIEmbeddingClient["embeddings"]["create"]>>;
    try {
      response = await this.client.embeddings.create({
        model: this.modelId,
        input: texts,
        encoding_format: "float",
      });
    } catch (err) {
      const statusCode = statusCodeOf(err);
      const prefix = statusCode !== undefined ? `status ${statusCode}` : "request failed";
      throw new ServiceError("embedding", `Embedding ${prefix}: ${errorMessage(err)}`, {
        cause: err,
        statusCode,
      });
    }

    if (response.data.length !== texts.length) {
      throw new ServiceError(
        "embedding",
        `Embedding returned ${response.data.length} vectors for ${texts.length} inputs`,
      );
    }

    // The API reports each vector's input position; do not trust array order.
    const vectors = [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);

    return {
      status: "success",
      value: { vectors, modelId: response.model ?? this.modelId },
    };
  }
}

// ─── OfflineEmbeddingGateway ────────────────────────────────────────────────────

/**
 * Deterministic pseudo-embedding from the MD5 digest of `text`:
 * component i is digest[i mod 16] / 255 − 0.5. Same text → same vector.
 */
export function hashEmbedding(text: string, dimension: number): number[] {
  const digest = createHash("md5").update(text, "utf-8").digest();
  const vector = new Array<number>(dimension);
  for (let i = 0; i < dimension; i++) {
    vector[i] = digest[i % digest.length] / 255 - 0.5;
  }
  return vector;
}

export const OFFLINE_EMBEDDING_MODEL_ID = "offline-md5-hash";

export class OfflineEmbeddingGateway implements EmbeddingGateway {
  readonly modelId = OFFLINE_EMBEDDING_MODEL_ID;
  readonly dimension: number;
  private readonly reason: string;

  constructor(dimension: number, reason: string = "offline mode") {
    this.dimension = dimension;
    this.reason = reason;
  }

  async embed(texts: string[]): Promise<Outcome<EmbeddingResponse>> {
    return {
      status: "degraded",
      reason: this.reason,
      value: {
        vectors: texts.map((t) => hashEmbedding(t, this.dimension)),
        modelId: this.modelId,
      },
    };
  }
}

// ─── Fallback decorator ─────────────────────────────────────────────────────────

/**
 * Wrap `primary` so a ServiceError is answered with offline hash vectors,
 * tagged "degraded" with the original failure as the reason.
 */
export function withEmbeddingFallback(
  primary: EmbeddingGateway,
  offline: EmbeddingGateway,
  logger: Logger,
): EmbeddingGateway {
  return {
    modelId: primary.modelId,
    dimension: primary.dimension,
    async embed(texts) {
      try {
        return await primary.embed(texts);
      } catch (err) {
        if (!(err instanceof ServiceError)) throw err;
        logger.warn(`Embeddings unavailable, substituting offline vectors: ${err.message}`);
        const substitute = await offline.embed(texts);
        return { status: "degraded", value: substitute.value, reason: err.message };
      }
    },
  };
}
