// Paper Script Pipeline - Shared TypeScript interfaces and types
// Runtime code stays out of this barrel except for the enums.

// ─── Phases ─────────────────────────────────────────────────────────────────────

export enum Phase {
  ASSESSMENT = "assessment",
  EXTRACTION = "extraction",
  STRUCTURE = "structure",
  VALIDATION = "validation",
}

/** Phases in execution order. Each phase's prompt depends on every earlier entry. */
export const PHASE_ORDER: readonly Phase[] = [
  Phase.ASSESSMENT,
  Phase.EXTRACTION,
  Phase.STRUCTURE,
  Phase.VALIDATION,
];

// ─── Pipeline State Machine ─────────────────────────────────────────────────────

export enum PipelineStage {
  PENDING = "pending",
  ASSESSMENT = "assessment",
  EXTRACTION = "extraction",
  STRUCTURE = "structure",
  VALIDATION = "validation",
  SCRIPTING = "scripting",
  FACT_CHECKING = "fact_checking",
  COMPLETED = "completed",
  FAILED = "failed",
}

export interface PipelineProgressEvent {
  runId: string;
  stage: PipelineStage;
  /** 0-100, fixed per stage. */
  progress: number;
}

export type PipelineProgressCallback = (event: PipelineProgressEvent) => void;

// ─── Gateway outcomes ───────────────────────────────────────────────────────────

/**
 * Result of a gateway call. A "degraded" outcome carries a substituted value
 * (offline placeholder) and the reason it was substituted, so callers never
 * mistake a placeholder for a genuine model response.
 */
export type Outcome<T> =
  | { status: "success"; value: T }
  | { status: "degraded"; value: T; reason: string };

export interface TokenUsage {
  prompt: number;
  completion: number;
  total: number;
}

export interface GenerationRequest {
  prompt: string;
  systemInstruction?: string;
  maxTokens: number;
  /** 0-1 */
  temperature: number;
}

export interface GenerationResponse {
  content: string;
  tokenUsage: TokenUsage;
  modelId: string;
}

export interface EmbeddingResponse {
  /** Positionally aligned with the submitted texts. */
  vectors: number[][];
  modelId: string;
}

// ─── Phase results ──────────────────────────────────────────────────────────────

export interface PhaseResult {
  phase: Phase;
  content: string;
  temperature: number;
  maxTokens: number;
  model: string;
  tokenUsage: TokenUsage;
  degraded: boolean;
  degradedReason?: string;
}

/**
 * Which phase's free text carries each autonomous decision. The text itself
 * is never parsed; the pipeline is a straight line.
 */
export interface AgenticDecisions {
  complexityLevel: Phase;
  targetAudience: Phase;
  structureOptimization: Phase;
  qualityAssurance: Phase;
}

export interface AnalysisResult {
  assessment: string;
  extraction: string;
  structure: string;
  validation: string;
  phaseResults: PhaseResult[];
  agenticDecisions: AgenticDecisions;
  /** ISO 8601 */
  processingTimestamp: string;
}

// ─── Chunks & fact checking ─────────────────────────────────────────────────────

export type ChunkSourceKind = "generated" | "source";

export interface Chunk {
  sourceKind: ChunkSourceKind;
  index: number;
  text: string;
}

export type ChunkStatus = "VALID" | "NEEDS_REVIEW";
export type ReportStatus = "PASSED" | "FAILED";

export interface ChunkValidation {
  generatedChunk: Chunk;
  /** Null when no source chunk scored above zero. */
  bestMatch: Chunk | null;
  similarityScore: number;
  status: ChunkStatus;
}

export interface ValidationReport {
  overallSimilarity: number;
  status: ReportStatus;
  chunkValidations: ChunkValidation[];
  /** overallSimilarity × 100 */
  factualAccuracy: number;
  embeddingModel: string | null;
  degraded: { reason: string } | null;
}

export interface FactCheckOptions {
  chunkSize: number;
  validThreshold: number;
  passThreshold: number;
}

// ─── Pipeline output ────────────────────────────────────────────────────────────

export interface ScriptResult {
  content: string;
  model: string;
  tokenUsage: TokenUsage;
  degraded: boolean;
  degradedReason?: string;
}

export interface RunMetrics {
  /** Podcast style id the run was prompted with. */
  style: string;
  llmModel: string;
  embeddingModel: string | null;
  decisionsMade: number;
  factualAccuracy: number;
  totalTokens: number;
  processingTimeMs: number;
  /** Gateway calls answered by a substituted placeholder. */
  degradedCalls: number;
}

export interface PipelineOutput {
  runId: string;
  analysis: AnalysisResult;
  script: string;
  scriptResult: ScriptResult;
  validation: ValidationReport;
  metrics: RunMetrics;
}

// ─── WebSocket Protocol Messages ────────────────────────────────────────────────

export type ClientMessage = { type: "start_pipeline"; sourceText: string; save?: boolean; style?: string };

export type ServerMessage =
  | { type: "progress"; runId: string; stage: PipelineStage; progress: number }
  | { type: "pipeline_complete"; output: PipelineOutput; savedPaths?: string[]; saveError?: string }
  | {
      type: "pipeline_error";
      code: string;
      message: string;
      phase?: string;
      completedPhases?: Phase[];
    }
  | { type: "error"; message: string };
