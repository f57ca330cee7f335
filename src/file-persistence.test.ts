// Unit tests for FilePersistence

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FilePersistence, buildDirectoryName, formatAnalysis } from "./file-persistence.js";
import { Phase, type PhaseResult, type PipelineOutput } from "./types.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function phaseResult(phase: Phase, overrides: Partial<PhaseResult> = {}): PhaseResult {
  return {
    phase,
    content: `${phase} text`,
    temperature: 0.3,
    maxTokens: 2048,
    model: "test-llm",
    tokenUsage: { prompt: 6, completion: 4, total: 10 },
    degraded: false,
    ...overrides,
  };
}

function makeOutput(): PipelineOutput {
  const phaseResults = [
    phaseResult(Phase.ASSESSMENT),
    phaseResult(Phase.EXTRACTION, { temperature: 0.7, maxTokens: 3000 }),
    phaseResult(Phase.STRUCTURE, { degraded: true, degradedReason: "offline mode" }),
    phaseResult(Phase.VALIDATION, { temperature: 0.2 }),
  ];
  return {
    runId: "run-123",
    analysis: {
      assessment: "assessment text",
      extraction: "extraction text",
      structure: "structure text",
      validation: "validation text",
      phaseResults,
      agenticDecisions: {
        complexityLevel: Phase.ASSESSMENT,
        targetAudience: Phase.ASSESSMENT,
        structureOptimization: Phase.STRUCTURE,
        qualityAssurance: Phase.VALIDATION,
      },
      processingTimestamp: "2025-03-01T10:00:00.000Z",
    },
    script: "**Host 1**: Hello.\n**Host 2**: Hi.",
    scriptResult: {
      content: "**Host 1**: Hello.\n**Host 2**: Hi.",
      model: "test-llm",
      tokenUsage: { prompt: 6, completion: 4, total: 10 },
      degraded: false,
    },
    validation: {
      overallSimilarity: 0.5,
      status: "FAILED",
      chunkValidations: [
        {
          generatedChunk: { sourceKind: "generated", index: 0, text: "Hello." },
          bestMatch: null,
          similarityScore: 0,
          status: "NEEDS_REVIEW",
        },
      ],
      factualAccuracy: 50,
      embeddingModel: "test-embed",
      degraded: null,
    },
    metrics: {
      style: "layperson",
      llmModel: "test-llm",
      embeddingModel: "test-embed",
      decisionsMade: 4,
      factualAccuracy: 50,
      totalTokens: 50,
      processingTimeMs: 1234,
      degradedCalls: 1,
    },
  };
}

// ─── buildDirectoryName ───────────────────────────────────────────────────────

describe("buildDirectoryName", () => {
  it("prefixes the run id with a zero-padded local timestamp", () => {
    expect(buildDirectoryName("run-123", new Date(2025, 0, 5, 9, 4, 3))).toBe("2025-01-05_09-04-03_run-123");
  });
});

// ─── formatAnalysis ───────────────────────────────────────────────────────────

describe("formatAnalysis", () => {
  const output = makeOutput();
  const lines = formatAnalysis(output.runId, output.analysis).split("\n");

  it("starts with a header naming the run", () => {
    expect(lines.slice(0, 4)).toEqual([
      "# Research Paper Analysis",
      "",
      "- Run ID: run-123",
      "- Processed: 2025-03-01T10:00:00.000Z",
    ]);
  });

  it("has a section per phase with its text", () => {
    const i = lines.indexOf("## Extraction");
    expect(lines.slice(i, i + 3)).toEqual(["## Extraction", "", "extraction text"]);
  });

  it("lists the decisions and per-call details", () => {
    expect(lines).toContain("- complexityLevel: assessment");
    expect(lines).toContain("- qualityAssurance: validation");
    expect(lines).toContain("- extraction: model test-llm, temperature 0.7, max tokens 3000, 10 tokens");
    expect(lines).toContain(
      "- structure: model test-llm, temperature 0.3, max tokens 2048, 10 tokens (degraded: offline mode)",
    );
  });
});

// ─── FilePersistence.saveRun ──────────────────────────────────────────────────

describe("FilePersistence", () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "pipeline-output-"));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("writes the four run files into a timestamped directory", async () => {
    const persistence = new FilePersistence(baseDir);
    const savedAt = new Date(2025, 2, 1, 10, 0, 0);

    const paths = await persistence.saveRun(makeOutput(), savedAt);

    const dir = join(baseDir, "2025-03-01_10-00-00_run-123");
    expect(paths).toEqual([
      join(dir, "analysis.md"),
      join(dir, "script.txt"),
      join(dir, "validation.json"),
      join(dir, "metrics.json"),
    ]);
    expect((await readdir(dir)).sort()).toEqual(["analysis.md", "metrics.json", "script.txt", "validation.json"]);
  });

  it("stores the script verbatim and the reports as JSON", async () => {
    const persistence = new FilePersistence(baseDir);
    const output = makeOutput();

    const [analysisPath, scriptPath, validationPath, metricsPath] = await persistence.saveRun(output);

    expect(await readFile(scriptPath, "utf-8")).toBe(output.script);
    expect(JSON.parse(await readFile(validationPath, "utf-8"))).toEqual(output.validation);
    expect(JSON.parse(await readFile(metricsPath, "utf-8"))).toEqual(output.metrics);
    expect(await readFile(analysisPath, "utf-8")).toBe(formatAnalysis(output.runId, output.analysis));
  });
});
