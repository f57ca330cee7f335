// Paper Script Pipeline - Prompt construction
//
// Pure builders: each takes the source text and the ordered results of every
// phase completed so far, and returns the prompt for the next call. Earlier
// outputs are interpolated verbatim so each phase sees what came before it.
// Structure and script synthesis also carry the chosen podcast style's hosts.

import { describeHostDynamics, getStyle, type PodcastStyle } from "./styles.js";
import { Phase, type PhaseResult } from "./types.js";

// ─── System instructions ────────────────────────────────────────────────────────

/** Analyst persona shared by Assessment, Extraction and Validation. */
export const ANALYST_SYSTEM_INSTRUCTION =
  "You are a research analyst who decides independently how a paper should be processed. " +
  "Analyze research papers and choose how their content should be organized and presented.";

/** Producer persona, used only by Structure. */
export const PRODUCER_SYSTEM_INSTRUCTION =
  "You are an experienced podcast producer and educational content designer. " +
  "Plan engaging, accessible content structures.";

export const SCRIPTWRITER_SYSTEM_INSTRUCTION =
  "You are a professional podcast scriptwriter creating engaging educational content.";

// ─── Per-phase sampling settings ────────────────────────────────────────────────

/** Assessment only sees the opening of the paper, counted in code points. */
export const ASSESSMENT_SOURCE_CHARS = 3000;

export interface CallSettings {
  systemInstruction: string;
  temperature: number;
  maxTokens: number;
}

export const PHASE_SETTINGS: Readonly<Record<Phase, CallSettings>> = {
  [Phase.ASSESSMENT]: { systemInstruction: ANALYST_SYSTEM_INSTRUCTION, temperature: 0.3, maxTokens: 2048 },
  [Phase.EXTRACTION]: { systemInstruction: ANALYST_SYSTEM_INSTRUCTION, temperature: 0.7, maxTokens: 3000 },
  [Phase.STRUCTURE]: { systemInstruction: PRODUCER_SYSTEM_INSTRUCTION, temperature: 0.5, maxTokens: 2048 },
  [Phase.VALIDATION]: { systemInstruction: ANALYST_SYSTEM_INSTRUCTION, temperature: 0.2, maxTokens: 2048 },
};

export const SCRIPT_SETTINGS: CallSettings = {
  systemInstruction: SCRIPTWRITER_SYSTEM_INSTRUCTION,
  temperature: 0.7,
  maxTokens: 2048,
};

export interface BuiltPrompt extends CallSettings {
  prompt: string;
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function contentOf(results: readonly PhaseResult[], phase: Phase): string {
  const result = results.find((r) => r.phase === phase);
  if (!result) {
    throw new Error(`Prompt for a later phase requested before ${phase} completed`);
  }
  return result.content;
}

// ─── Phase prompts ──────────────────────────────────────────────────────────────

function assessmentPrompt(sourceText: string): string {
  return `Analyze this research paper and decide how it should be processed.

Determine:
1. Complexity level (beginner / intermediate / advanced)
2. Target audience for the podcast adaptation
3. Key concepts that need explanation
4. Segmentation plan (number of segments, focus of each)
5. Fact-checking priorities

Paper content:
${Array.from(sourceText).slice(0, ASSESSMENT_SOURCE_CHARS).join("")}

Give your assessment and processing strategy.`;
}

function extractionPrompt(sourceText: string, results: readonly PhaseResult[]): string {
  return `Using your assessment below, extract and organize the key information from this research paper.

Produce:
1. Executive summary
2. Key findings and contributions
3. Methodology overview
4. Practical implications
5. Technical concepts that need explanation

Match the depth of the extraction to the complexity level you identified.

Your assessment:
${contentOf(results, Phase.ASSESSMENT)}

Paper content:
${sourceText}`;
}

function structurePrompt(results: readonly PhaseResult[], style: PodcastStyle): string {
  const breakLine = style.adBreak[0] ?? "Let's take a quick break.";
  return `Design the podcast structure for this research paper.

Decide:
1. Number of segments and the focus of each
2. Which host leads each segment
3. Conversational style and complexity level
4. Explanations the general audience will need
5. Flow and transitions between segments

Write a segment-by-segment plan that keeps listeners engaged and informed.
With four or more segments, place one short break at the midpoint, led in with something like "${breakLine}"

Host dynamics:
${describeHostDynamics(style)}

Research assessment:
${contentOf(results, Phase.ASSESSMENT)}

Extracted findings:
${contentOf(results, Phase.EXTRACTION)}`;
}

function validationPrompt(results: readonly PhaseResult[]): string {
  return `Review the podcast structure proposed for this research paper.

Check:
1. Will this structure communicate the research effectively?
2. Is the complexity level right for the target audience?
3. Are there gaps in explanation or flow?
4. What adjustments would improve quality?

List any corrections you would make.

Proposed structure:
${contentOf(results, Phase.STRUCTURE)}`;
}

/**
 * Build the prompt for `phase` from the source text and every earlier result.
 * Throws if a phase this prompt depends on has not completed.
 */
export function buildPhasePrompt(
  phase: Phase,
  sourceText: string,
  priorResults: readonly PhaseResult[],
  style: PodcastStyle = getStyle(),
): BuiltPrompt {
  let prompt: string;
  switch (phase) {
    case Phase.ASSESSMENT:
      prompt = assessmentPrompt(sourceText);
      break;
    case Phase.EXTRACTION:
      prompt = extractionPrompt(sourceText, priorResults);
      break;
    case Phase.STRUCTURE:
      prompt = structurePrompt(priorResults, style);
      break;
    case Phase.VALIDATION:
      prompt = validationPrompt(priorResults);
      break;
  }
  return { ...PHASE_SETTINGS[phase], prompt };
}

/** Script synthesis draws on the assessment, the planned structure and the style's hosts. */
export function buildScriptPrompt(
  results: readonly PhaseResult[],
  style: PodcastStyle = getStyle(),
): BuiltPrompt {
  const prompt = `Using the analysis and structure below, write the first segment of the podcast script.

Analysis:
${contentOf(results, Phase.ASSESSMENT)}

Structure:
${contentOf(results, Phase.STRUCTURE)}

Host dynamics:
${describeHostDynamics(style)}

Open the episode along these lines, with {topic} standing for the paper's subject:
${style.intro.join(" ")}

Write natural dialogue between two hosts who introduce and explain this research.`;
  return { ...SCRIPT_SETTINGS, prompt };
}
