// Paper Script Pipeline - Pipeline orchestrator
//
// Straight-line state machine over one source document:
//
//   PENDING → ASSESSMENT → EXTRACTION → STRUCTURE → VALIDATION
//           → SCRIPTING → FACT_CHECKING → COMPLETED
//
// Any running stage may move to FAILED. Phases are strictly sequential: each
// prompt is built from the outputs of every earlier phase. The decision text
// each phase produces is passed along verbatim, never parsed or branched on.
//
// Failure policy: no gateway call is retried here. A failed call aborts the
// run; the PipelineRun object keeps every phase result completed before the
// failure readable, and no script or report is produced after it.

import { v4 as uuidv4 } from "uuid";
import { DEFAULT_MAX_TOTAL_TOKENS } from "./config.js";
import {
  BudgetExceededError,
  FactCheckUnavailableError,
  InvalidSourceError,
  PhaseFailedError,
  PipelineError,
  errorMessage,
} from "./errors.js";
import type { FactChecker } from "./fact-checker.js";
import type { GenerationGateway } from "./generation-gateway.js";
import { createConsoleLogger, type Logger } from "./logging.js";
import { buildPhasePrompt, buildScriptPrompt, type BuiltPrompt } from "./prompts.js";
import { getStyle, type PodcastStyle } from "./styles.js";
import {
  PHASE_ORDER,
  Phase,
  PipelineStage,
  type AgenticDecisions,
  type AnalysisResult,
  type GenerationResponse,
  type Outcome,
  type PhaseResult,
  type PipelineOutput,
  type PipelineProgressCallback,
  type ScriptResult,
  type ValidationReport,
} from "./types.js";

// ─── State machine ──────────────────────────────────────────────────────────────

const VALID_TRANSITIONS: ReadonlyMap<PipelineStage, readonly PipelineStage[]> = new Map([
  [PipelineStage.PENDING, [PipelineStage.ASSESSMENT, PipelineStage.FAILED]],
  [PipelineStage.ASSESSMENT, [PipelineStage.EXTRACTION, PipelineStage.FAILED]],
  [PipelineStage.EXTRACTION, [PipelineStage.STRUCTURE, PipelineStage.FAILED]],
  [PipelineStage.STRUCTURE, [PipelineStage.VALIDATION, PipelineStage.FAILED]],
  [PipelineStage.VALIDATION, [PipelineStage.SCRIPTING, PipelineStage.FAILED]],
  [PipelineStage.SCRIPTING, [PipelineStage.FACT_CHECKING, PipelineStage.FAILED]],
  [PipelineStage.FACT_CHECKING, [PipelineStage.COMPLETED, PipelineStage.FAILED]],
  [PipelineStage.COMPLETED, []],
  [PipelineStage.FAILED, []],
]);

export function canTransition(from: PipelineStage, to: PipelineStage): boolean {
  return VALID_TRANSITIONS.get(from)?.includes(to) ?? false;
}

/** Progress percentage reported when a stage is entered. */
export const STAGE_PROGRESS: Readonly<Record<PipelineStage, number>> = {
  [PipelineStage.PENDING]: 0,
  [PipelineStage.ASSESSMENT]: 10,
  [PipelineStage.EXTRACTION]: 30,
  [PipelineStage.STRUCTURE]: 50,
  [PipelineStage.VALIDATION]: 65,
  [PipelineStage.SCRIPTING]: 80,
  [PipelineStage.FACT_CHECKING]: 90,
  [PipelineStage.COMPLETED]: 100,
  [PipelineStage.FAILED]: 0,
};

const PHASE_STAGE: Readonly<Record<Phase, PipelineStage>> = {
  [Phase.ASSESSMENT]: PipelineStage.ASSESSMENT,
  [Phase.EXTRACTION]: PipelineStage.EXTRACTION,
  [Phase.STRUCTURE]: PipelineStage.STRUCTURE,
  [Phase.VALIDATION]: PipelineStage.VALIDATION,
};

export const AGENTIC_DECISIONS: Readonly<AgenticDecisions> = {
  complexityLevel: Phase.ASSESSMENT,
  targetAudience: Phase.ASSESSMENT,
  structureOptimization: Phase.STRUCTURE,
  qualityAssurance: Phase.VALIDATION,
};

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface PipelineOrchestratorDeps {
  generation: GenerationGateway;
  factChecker: FactChecker;
  logger?: Logger;
  /** Cumulative token ceiling per run. */
  maxTotalTokens?: number;
}

export interface RunOptions {
  onProgress?: PipelineProgressCallback;
  /** Podcast style id; defaults to "layperson". */
  style?: string;
}

// ─── PipelineRun ────────────────────────────────────────────────────────────────

/**
 * One execution over one source document. Owns its phase results exclusively;
 * nothing here is shared across runs.
 */
export class PipelineRun {
  readonly id: string;
  readonly sourceText: string;
  readonly style: PodcastStyle;

  private readonly generation: GenerationGateway;
  private readonly factChecker: FactChecker;
  private readonly logger: Logger;
  private readonly maxTotalTokens: number;
  private readonly onProgress?: PipelineProgressCallback;

  private currentStage: PipelineStage = PipelineStage.PENDING;
  private readonly results: PhaseResult[] = [];
  private scriptResult: ScriptResult | null = null;
  private report: ValidationReport | null = null;
  private failure: PipelineError | null = null;
  private tokensUsed = 0;

  constructor(
    sourceText: string,
    deps: Required<PipelineOrchestratorDeps>,
    style: PodcastStyle,
    onProgress?: PipelineProgressCallback,
  ) {
    this.id = uuidv4();
    this.sourceText = sourceText;
    this.style = style;
    this.generation = deps.generation;
    this.factChecker = deps.factChecker;
    this.logger = deps.logger;
    this.maxTotalTokens = deps.maxTotalTokens;
    this.onProgress = onProgress;
  }

  get stage(): PipelineStage {
    return this.currentStage;
  }

  /** Results of every phase completed so far, in execution order. */
  get phaseResults(): readonly PhaseResult[] {
    return [...this.results];
  }

  get script(): ScriptResult | null {
    return this.scriptResult;
  }

  get validation(): ValidationReport | null {
    return this.report;
  }

  get error(): PipelineError | null {
    return this.failure;
  }

  get totalTokens(): number {
    return this.tokensUsed;
  }

  /**
   * Run every stage in order. Rejects with PhaseFailedError,
   * FactCheckUnavailableError, BudgetExceededError or InvalidSourceError;
   * the run keeps its partial results either way.
   */
  async execute(): Promise<PipelineOutput> {
    if (this.currentStage !== PipelineStage.PENDING) {
      throw new Error(`Run ${this.id} already started (stage "${this.currentStage}")`);
    }
    const startedAt = Date.now();

    if (this.sourceText.trim().length === 0) {
      return this.fail(new InvalidSourceError("Source text is empty"));
    }

    this.logger.info(`Run ${this.id}: starting (${this.sourceText.length} chars, style ${this.style.id})`);

    // ── Phases 1-4 ──
    for (const phase of PHASE_ORDER) {
      this.transition(PHASE_STAGE[phase]);
      const built = buildPhasePrompt(phase, this.sourceText, this.results, this.style);
      const outcome = await this.callGeneration(built, phase);
      this.results.push(toPhaseResult(phase, built, outcome));
      this.logger.info(
        `Run ${this.id}: ${phase} complete (${outcome.value.tokenUsage.total} tokens${outcome.status === "degraded" ? ", degraded" : ""})`,
      );
    }

    // ── Script synthesis ──
    this.transition(PipelineStage.SCRIPTING);
    const scriptPrompt = buildScriptPrompt(this.results, this.style);
    const scriptOutcome = await this.callGeneration(scriptPrompt, "script");
    const scriptResult: ScriptResult = {
      content: scriptOutcome.value.content,
      model: scriptOutcome.value.modelId,
      tokenUsage: scriptOutcome.value.tokenUsage,
      degraded: scriptOutcome.status === "degraded",
      ...(scriptOutcome.status === "degraded" ? { degradedReason: scriptOutcome.reason } : {}),
    };
    this.scriptResult = scriptResult;

    // ── Fact check ──
    this.transition(PipelineStage.FACT_CHECKING);
    let validation: ValidationReport;
    try {
      validation = await this.factChecker.validate(scriptResult.content, this.sourceText);
    } catch (err) {
      return this.fail(new FactCheckUnavailableError(err));
    }
    this.report = validation;

    const analysis = this.buildAnalysis();
    const degradedCalls =
      this.results.filter((r) => r.degraded).length +
      (scriptResult.degraded ? 1 : 0) +
      (validation.degraded ? 1 : 0);

    this.transition(PipelineStage.COMPLETED);
    this.logger.info(
      `Run ${this.id}: completed, validation ${validation.status}, accuracy ${validation.factualAccuracy.toFixed(1)}%`,
    );

    return {
      runId: this.id,
      analysis,
      script: scriptResult.content,
      scriptResult,
      validation,
      metrics: {
        style: this.style.id,
        llmModel: this.generation.modelId,
        embeddingModel: validation.embeddingModel,
        decisionsMade: Object.keys(analysis.agenticDecisions).length,
        factualAccuracy: validation.factualAccuracy,
        totalTokens: this.tokensUsed,
        processingTimeMs: Date.now() - startedAt,
        degradedCalls,
      },
    };
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private async callGeneration(
    built: BuiltPrompt,
    step: Phase | "script",
  ): Promise<Outcome<GenerationResponse>> {
    if (this.tokensUsed >= this.maxTotalTokens) {
      return this.fail(new BudgetExceededError(this.tokensUsed, this.maxTotalTokens));
    }
    let outcome: Outcome<GenerationResponse>;
    try {
      outcome = await this.generation.generate({
        prompt: built.prompt,
        systemInstruction: built.systemInstruction,
        maxTokens: built.maxTokens,
        temperature: built.temperature,
      });
    } catch (err) {
      return this.fail(new PhaseFailedError(step, this.results.map((r) => r.phase), err));
    }
    this.tokensUsed += outcome.value.tokenUsage.total;
    return outcome;
  }

  private buildAnalysis(): AnalysisResult {
    const contentOf = (phase: Phase) => this.results.find((r) => r.phase === phase)?.content ?? "";
    return {
      assessment: contentOf(Phase.ASSESSMENT),
      extraction: contentOf(Phase.EXTRACTION),
      structure: contentOf(Phase.STRUCTURE),
      validation: contentOf(Phase.VALIDATION),
      phaseResults: [...this.results],
      agenticDecisions: { ...AGENTIC_DECISIONS },
      processingTimestamp: new Date().toISOString(),
    };
  }

  private transition(next: PipelineStage): void {
    if (!canTransition(this.currentStage, next)) {
      throw new Error(`Invalid pipeline transition from "${this.currentStage}" to "${next}"`);
    }
    this.logger.debug(`Run ${this.id}: ${this.currentStage} → ${next}`);
    this.currentStage = next;
    if (this.onProgress) {
      try {
        this.onProgress({ runId: this.id, stage: next, progress: STAGE_PROGRESS[next] });
      } catch (err) {
        this.logger.warn(`Run ${this.id}: progress listener threw: ${errorMessage(err)}`);
      }
    }
  }

  private fail(err: PipelineError): never {
    this.failure = err;
    this.logger.error(`Run ${this.id}: ${err.message}`);
    this.transition(PipelineStage.FAILED);
    throw err;
  }
}

function toPhaseResult(
  phase: Phase,
  built: BuiltPrompt,
  outcome: Outcome<GenerationResponse>,
): PhaseResult {
  return {
    phase,
    content: outcome.value.content,
    temperature: built.temperature,
    maxTokens: built.maxTokens,
    model: outcome.value.modelId,
    tokenUsage: outcome.value.tokenUsage,
    degraded: outcome.status === "degraded",
    ...(outcome.status === "degraded" ? { degradedReason: outcome.reason } : {}),
  };
}

// ─── PipelineOrchestrator ───────────────────────────────────────────────────────

export class PipelineOrchestrator {
  private readonly deps: Required<PipelineOrchestratorDeps>;

  constructor(deps: PipelineOrchestratorDeps) {
    this.deps = {
      generation: deps.generation,
      factChecker: deps.factChecker,
      logger: deps.logger ?? createConsoleLogger("PipelineOrchestrator"),
      maxTotalTokens: deps.maxTotalTokens ?? DEFAULT_MAX_TOTAL_TOKENS,
    };
  }

  /**
   * Create a run without starting it, so callers can inspect it after a failure.
   * Throws UnknownStyleError for a style id that is not in the table.
   */
  createRun(sourceText: string, options: RunOptions = {}): PipelineRun {
    return new PipelineRun(sourceText, this.deps, getStyle(options.style), options.onProgress);
  }

  async run(sourceText: string, options: RunOptions = {}): Promise<PipelineOutput> {
    return this.createRun(sourceText, options).execute();
  }
}
