import { describe, it, expect } from "vitest";
import { cosineSimilarity } from "./similarity.js";
import { DimensionMismatchError } from "./errors.js";

describe("cosineSimilarity", () => {
  it("is 0 for orthogonal vectors", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("is 1 for parallel vectors of different magnitude", () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
  });

  it("is -1 for opposite vectors", () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it("returns 0 when either vector has zero magnitude", () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [0, 0, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });

  it("throws DimensionMismatchError instead of truncating", () => {
    let caught: unknown;
    try {
      cosineSimilarity([1, 0], [1, 0, 0]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DimensionMismatchError);
    expect(caught).toMatchObject({
      code: "DIMENSION_MISMATCH",
      expected: 2,
      actual: 3,
      message: "Vector dimension mismatch: 2 vs 3",
    });
  });
});
