// Paper Script Pipeline - File Persistence
// Opt-in saving of run outputs to disk.
//
// Files are only written when the caller asks for it (`save: true` on the HTTP
// or WebSocket request). Run outputs otherwise live in memory only.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AnalysisResult, PipelineOutput, ValidationReport } from "./types.js";

/**
 * Renders the analysis.md content: one section per phase, then the decision
 * labels and per-phase call details.
 */
export function formatAnalysis(runId: string, analysis: AnalysisResult): string {
  const lines: string[] = [];

  lines.push("# Research Paper Analysis");
  lines.push("");
  lines.push(`- Run ID: ${runId}`);
  lines.push(`- Processed: ${analysis.processingTimestamp}`);
  lines.push("");

  const sections: Array<[string, string]> = [
    ["Assessment", analysis.assessment],
    ["Extraction", analysis.extraction],
    ["Structure", analysis.structure],
    ["Validation", analysis.validation],
  ];
  for (const [title, content] of sections) {
    lines.push(`## ${title}`);
    lines.push("");
    lines.push(content);
    lines.push("");
  }

  lines.push("## Decisions");
  lines.push("");
  for (const [decision, phase] of Object.entries(analysis.agenticDecisions)) {
    lines.push(`- ${decision}: ${phase}`);
  }
  lines.push("");

  lines.push("## Calls");
  lines.push("");
  for (const r of analysis.phaseResults) {
    const degraded = r.degraded ? ` (degraded: ${r.degradedReason ?? "unknown"})` : "";
    lines.push(
      `- ${r.phase}: model ${r.model}, temperature ${r.temperature}, max tokens ${r.maxTokens}, ${r.tokenUsage.total} tokens${degraded}`,
    );
  }

  return lines.join("\n");
}

/** Serializes a validation report to pretty-printed JSON. */
export function formatValidation(report: ValidationReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Generates the output directory name for a run.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{runId}` (local time)
 */
export function buildDirectoryName(runId: string, date: Date = new Date()): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const seconds = String(date.getSeconds()).padStart(2, "0");

  const timestamp = `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
  return `${timestamp}_${runId}`;
}

/**
 * FilePersistence handles opt-in saving of run outputs to disk.
 *
 * Output directory structure:
 *   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{runId}/
 *     analysis.md
 *     script.txt
 *     validation.json
 *     metrics.json
 */
export class FilePersistence {
  private baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = baseDir;
  }

  /** @returns Paths of the files written, in the order above. */
  async saveRun(output: PipelineOutput, savedAt: Date = new Date()): Promise<string[]> {
    const dirPath = join(this.baseDir, buildDirectoryName(output.runId, savedAt));
    await mkdir(dirPath, { recursive: true });

    const files: Array<[string, string]> = [
      ["analysis.md", formatAnalysis(output.runId, output.analysis)],
      ["script.txt", output.script],
      ["validation.json", formatValidation(output.validation)],
      ["metrics.json", JSON.stringify(output.metrics, null, 2)],
    ];

    const savedPaths: string[] = [];
    for (const [name, content] of files) {
      const filePath = join(dirPath, name);
      await writeFile(filePath, content, "utf-8");
      savedPaths.push(filePath);
    }
    return savedPaths;
  }
}
