import { describe, it, expect, vi } from "vitest";
import { FactChecker, findBestMatch } from "./fact-checker.js";
import { OfflineEmbeddingGateway } from "./embedding-gateway.js";
import { DimensionMismatchError, ServiceError } from "./errors.js";
import type { EmbeddingResponse, Outcome } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

function createSilentLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Gateway whose vector for each text comes from `lookup`. */
function fakeGateway(lookup: (text: string) => number[]) {
  const embed = vi.fn(
    async (texts: string[]): Promise<Outcome<EmbeddingResponse>> => ({
      status: "success",
      value: { vectors: texts.map(lookup), modelId: "test-embed" },
    }),
  );
  return { gateway: { modelId: "test-embed", dimension: 2, embed }, embed };
}

/** alpha → x axis, beta → y axis, anything else → zero vector. */
function axisVector(text: string): number[] {
  if (text.includes("alpha")) return [1, 0];
  if (text.includes("beta")) return [0, 1];
  return [0, 0];
}

// ─── findBestMatch ──────────────────────────────────────────────────────────────

describe("findBestMatch", () => {
  it("picks the highest-scoring candidate", () => {
    expect(findBestMatch([1, 0], [[0, 1], [1, 0]])).toEqual({ score: 1, index: 1 });
  });

  it("keeps the first candidate on a tie", () => {
    expect(findBestMatch([1, 0], [[2, 0], [1, 0]])).toEqual({ score: 1, index: 0 });
  });

  it("reports no match when every score is zero or negative", () => {
    expect(findBestMatch([1, 0], [[-1, 0], [0, 1]])).toEqual({ score: 0, index: -1 });
    expect(findBestMatch([1, 0], [])).toEqual({ score: 0, index: -1 });
  });
});

// ─── FactChecker.validate ───────────────────────────────────────────────────────

describe("FactChecker", () => {
  it("returns an empty FAILED report for empty generated text without embedding", async () => {
    const { gateway, embed } = fakeGateway(axisVector);
    const checker = new FactChecker(gateway, {}, createSilentLogger());

    const report = await checker.validate("   ", "alpha source");

    expect(report).toEqual({
      overallSimilarity: 0,
      status: "FAILED",
      chunkValidations: [],
      factualAccuracy: 0,
      embeddingModel: null,
      degraded: null,
    });
    expect(embed).not.toHaveBeenCalled();
  });

  it("embeds generated chunks then source chunks in a single call", async () => {
    const { gateway, embed } = fakeGateway(axisVector);
    const checker = new FactChecker(gateway, { chunkSize: 2 }, createSilentLogger());

    await checker.validate("a b c", "d e");

    expect(embed).toHaveBeenCalledTimes(1);
    expect(embed).toHaveBeenCalledWith(["a b", "c", "d e"]);
  });

  it("scores identical text as PASSED", async () => {
    const checker = new FactChecker(new OfflineEmbeddingGateway(16), { chunkSize: 3 }, createSilentLogger());
    const text = "the model improves accuracy on every benchmark we tried";

    const report = await checker.validate(text, text);

    expect(report.status).toBe("PASSED");
    expect(report.overallSimilarity).toBeCloseTo(1, 9);
    expect(report.factualAccuracy).toBeCloseTo(100, 7);
    expect(report.chunkValidations).toHaveLength(3);
    for (const v of report.chunkValidations) {
      expect(v.status).toBe("VALID");
      expect(v.bestMatch?.text).toBe(v.generatedChunk.text);
    }
    expect(report.embeddingModel).toBe("offline-md5-hash");
    expect(report.degraded).toEqual({ reason: "offline mode" });
  });

  it("scores orthogonal text as FAILED with no best match", async () => {
    const { gateway } = fakeGateway(axisVector);
    const checker = new FactChecker(gateway, {}, createSilentLogger());

    const report = await checker.validate("alpha", "beta");

    expect(report).toEqual({
      overallSimilarity: 0,
      status: "FAILED",
      chunkValidations: [
        {
          generatedChunk: { sourceKind: "generated", index: 0, text: "alpha" },
          bestMatch: null,
          similarityScore: 0,
          status: "NEEDS_REVIEW",
        },
      ],
      factualAccuracy: 0,
      embeddingModel: "test-embed",
      degraded: null,
    });
  });

  it("averages chunk scores into the overall similarity", async () => {
    const { gateway } = fakeGateway(axisVector);
    const checker = new FactChecker(gateway, { chunkSize: 1 }, createSilentLogger());

    const report = await checker.validate("alpha beta", "alpha gamma");

    expect(report.chunkValidations).toEqual([
      {
        generatedChunk: { sourceKind: "generated", index: 0, text: "alpha" },
        bestMatch: { sourceKind: "source", index: 0, text: "alpha" },
        similarityScore: 1,
        status: "VALID",
      },
      {
        generatedChunk: { sourceKind: "generated", index: 1, text: "beta" },
        bestMatch: null,
        similarityScore: 0,
        status: "NEEDS_REVIEW",
      },
    ]);
    expect(report.overallSimilarity).toBe(0.5);
    expect(report.factualAccuracy).toBe(50);
    expect(report.status).toBe("FAILED");
  });

  it("requires scores strictly above both thresholds", async () => {
    const { gateway } = fakeGateway(axisVector);
    const checker = new FactChecker(gateway, {}, createSilentLogger());

    const report = await checker.validate("alpha", "alpha", { validThreshold: 1, passThreshold: 1 });

    expect(report.overallSimilarity).toBe(1);
    expect(report.chunkValidations[0].status).toBe("NEEDS_REVIEW");
    expect(report.status).toBe("FAILED");
  });

  it("scores every generated chunk against an empty source as zero", async () => {
    const { gateway, embed } = fakeGateway(axisVector);
    const checker = new FactChecker(gateway, {}, createSilentLogger());

    const report = await checker.validate("alpha", "");

    expect(embed).toHaveBeenCalledWith(["alpha"]);
    expect(report.chunkValidations[0]).toMatchObject({ bestMatch: null, similarityScore: 0 });
    expect(report.status).toBe("FAILED");
  });

  it("propagates gateway failures without a partial report", async () => {
    const failure = new ServiceError("embedding", "Embedding status 500: boom");
    const embed = vi.fn(async (): Promise<Outcome<EmbeddingResponse>> => {
      throw failure;
    });
    const checker = new FactChecker({ modelId: "test-embed", dimension: 2, embed }, {}, createSilentLogger());

    await expect(checker.validate("alpha", "alpha")).rejects.toBe(failure);
  });

  it("aborts on a vector dimension mismatch", async () => {
    const { gateway } = fakeGateway((text) => (text === "alpha" ? [1, 0] : [1, 0, 0]));
    const checker = new FactChecker(gateway, {}, createSilentLogger());

    await expect(checker.validate("alpha", "beta")).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it("rejects a gateway that returns the wrong number of vectors", async () => {
    const embed = vi.fn(
      async (): Promise<Outcome<EmbeddingResponse>> => ({
        status: "success",
        value: { vectors: [[1, 0]], modelId: "test-embed" },
      }),
    );
    const checker = new FactChecker({ modelId: "test-embed", dimension: 2, embed }, {}, createSilentLogger());

    await expect(checker.validate("alpha", "beta")).rejects.toThrow(
      "Embedding gateway returned 1 vectors for 2 chunks",
    );
  });
});
