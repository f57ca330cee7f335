// Paper Script Pipeline - Generation gateway
// Maps a prompt (+ optional system instruction) to generated text.
//
// Implementations:
//   OpenAIGenerationGateway:  any OpenAI-compatible chat completions endpoint
//                              (NVIDIA NIM by default, see config.ts).
//   OfflineGenerationGateway: deterministic placeholder text, always "degraded".
//   withGenerationFallback:   opt-in decorator substituting the offline text
//                              when the primary gateway raises ServiceError.

import OpenAI from "openai";
import { ServiceError, errorMessage } from "./errors.js";
import type { Logger } from "./logging.js";
import type { GenerationRequest, GenerationResponse, Outcome } from "./types.js";
import { splitWords } from "./text-chunker.js";

export interface GenerationGateway {
  readonly modelId: string;
  generate(request: GenerationRequest): Promise<Outcome<GenerationResponse>>;
}

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user"; content: string }>;
        max_tokens: number;
        temperature: number;
        top_p?: number;
        stream?: false;
      }): Promise<{
        model?: string;
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
        usage?: {
          prompt_tokens: number;
          completion_tokens: number;
          total_tokens: number;
        } | null;
      }>;
    };
  };
}

/** Status code carried by an SDK error, when the server answered at all. */
export function statusCodeOf(err: unknown): number | undefined {
  return err instanceof OpenAI.APIError ? err.status : undefined;
}

// ─── OpenAIGenerationGateway ────────────────────────────────────────────────────

export class OpenAIGenerationGateway implements GenerationGateway {
  readonly modelId: string;
  private readonly client: OpenAIChatClient;

  constructor(client: OpenAIChatClient, modelId: string) {
    this.client = client;
    this.modelId = modelId;
  }

  async generate(request: GenerationRequest): Promise<Outcome<GenerationResponse>> {
    const messages: Array<{ role: "system" | "user"; content: string }> = [];
    if (request.systemInstruction) {
      messages.push({ role: "system", content: request.systemInstruction });
    }
    messages.push({ role: "user", content: request.prompt });

    let response: Awaited<ReturnType<OpenAIChatClient["chat"]["completions"]["create"]>>;
    try {
      response = await this.client.chat.completions.create({
        model: this.modelId,
        messages,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        top_p: 0.9,
        stream: false,
      });
    } catch (err) {
      const statusCode = statusCodeOf(err);
      const prefix = statusCode !== undefined ? `status ${statusCode}` : "request failed";
      throw new ServiceError("generation", `Generation ${prefix}: ${errorMessage(err)}`, {
        cause: err,
        statusCode,
      });
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new ServiceError("generation", "Generation returned empty response");
    }

    const usage = response.usage;
    return {
      status: "success",
      value: {
        content,
        tokenUsage: usage
          ? { prompt: usage.prompt_tokens, completion: usage.completion_tokens, total: usage.total_tokens }
          : { prompt: 0, completion: 0, total: 0 },
        modelId: response.model ?? this.modelId,
      },
    };
  }
}

// ─── OfflineGenerationGateway ───────────────────────────────────────────────────

const OFFLINE_SCRIPT_TEXT = `**Host 1**: Welcome back! Today we're looking at a new research paper and what it sets out to do.

**Host 2**: The authors tackle a hard problem, and the way they combine several techniques is what caught our attention.

**Host 1**: Let's walk through the method first, then the results, and finally what it could mean in practice.

**Host 2**: Sounds good. There's a lot here that listeners outside the field will find useful.`;

const OFFLINE_ANALYSIS_TEXT = `Analysis of the research paper:

1. **Main contribution**: the paper proposes an approach that advances the current state of the art.
2. **Methodology**: the authors use a structured experimental design with a broad evaluation.
3. **Results**: improvements are reported across several benchmarks.
4. **Implications**: the work points to practical applications and follow-up research.`;

/** Placeholder text used when no model is reachable; picked by prompt keywords. */
export function offlineContentFor(prompt: string): string {
  const lower = prompt.toLowerCase();
  if (lower.includes("script") || lower.includes("dialogue")) {
    return OFFLINE_SCRIPT_TEXT;
  }
  if (lower.includes("research paper") || lower.includes("analysis")) {
    return OFFLINE_ANALYSIS_TEXT;
  }
  return `Offline placeholder response for: ${prompt.trim().slice(0, 100)}`;
}

export const OFFLINE_MODEL_ID = "offline-placeholder";

export class OfflineGenerationGateway implements GenerationGateway {
  readonly modelId = OFFLINE_MODEL_ID;
  private readonly reason: string;

  constructor(reason: string = "offline mode") {
    this.reason = reason;
  }

  async generate(request: GenerationRequest): Promise<Outcome<GenerationResponse>> {
    const content = offlineContentFor(request.prompt);
    const promptTokens = splitWords(request.prompt).length;
    const completionTokens = splitWords(content).length;
    return {
      status: "degraded",
      reason: this.reason,
      value: {
        content,
        tokenUsage: {
          prompt: promptTokens,
          completion: completionTokens,
          total: promptTokens + completionTokens,
        },
        modelId: this.modelId,
      },
    };
  }
}

// ─── Fallback decorator ─────────────────────────────────────────────────────────

/**
 * Wrap `primary` so a ServiceError is answered by `offline` instead of
 * propagating. The substituted response is always tagged "degraded" with the
 * original failure as the reason. Other errors propagate unchanged.
 */
export function withGenerationFallback(
  primary: GenerationGateway,
  offline: GenerationGateway,
  logger: Logger,
): GenerationGateway {
  return {
    modelId: primary.modelId,
    async generate(request) {
      try {
        return await primary.generate(request);
      } catch (err) {
        if (!(err instanceof ServiceError)) throw err;
        logger.warn(`Generation unavailable, substituting offline response: ${err.message}`);
        const substitute = await offline.generate(request);
        return { status: "degraded", value: substitute.value, reason: err.message };
      }
    },
  };
}
