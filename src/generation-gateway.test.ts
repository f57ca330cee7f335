import { describe, it, expect, vi } from "vitest";
import OpenAI from "openai";
import {
  OFFLINE_MODEL_ID,
  OfflineGenerationGateway,
  OpenAIGenerationGateway,
  offlineContentFor,
  withGenerationFallback,
  type GenerationGateway,
  type OpenAIChatClient,
} from "./generation-gateway.js";
import { ServiceError } from "./errors.js";
import type { GenerationRequest, GenerationResponse, Outcome } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

function createSilentLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

type ChatResponse = Awaited<ReturnType<OpenAIChatClient["chat"]["completions"]["create"]>>;

function mockClient(impl: () => Promise<ChatResponse>) {
  const create = vi.fn(impl);
  const client: OpenAIChatClient = { chat: { completions: { create } } };
  return { client, create };
}

const request: GenerationRequest = {
  prompt: "Summarize the paper",
  systemInstruction: "You are a research analyst.",
  maxTokens: 2048,
  temperature: 0.3,
};

// ─── OpenAIGenerationGateway ────────────────────────────────────────────────────

describe("OpenAIGenerationGateway", () => {
  it("sends system and user messages with the request settings", async () => {
    const { client, create } = mockClient(async () => ({
      model: "test-llm",
      choices: [{ message: { content: "A summary." } }],
      usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
    }));
    const gateway = new OpenAIGenerationGateway(client, "test-llm");

    await gateway.generate(request);

    expect(create).toHaveBeenCalledWith({
      model: "test-llm",
      messages: [
        { role: "system", content: "You are a research analyst." },
        { role: "user", content: "Summarize the paper" },
      ],
      max_tokens: 2048,
      temperature: 0.3,
      top_p: 0.9,
      stream: false,
    });
  });

  it("omits the system message when no instruction is given", async () => {
    const { client, create } = mockClient(async () => ({
      choices: [{ message: { content: "ok" } }],
    }));
    const gateway = new OpenAIGenerationGateway(client, "test-llm");

    await gateway.generate({ prompt: "Hello", maxTokens: 10, temperature: 0 });

    expect(create.mock.calls[0]).toEqual([
      expect.objectContaining({ messages: [{ role: "user", content: "Hello" }] }),
    ]);
  });

  it("returns a success outcome with token usage and the reported model", async () => {
    const { client } = mockClient(async () => ({
      model: "test-llm-2024",
      choices: [{ message: { content: "A summary." } }],
      usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
    }));
    const gateway = new OpenAIGenerationGateway(client, "test-llm");

    const outcome = await gateway.generate(request);

    expect(outcome).toEqual({
      status: "success",
      value: {
        content: "A summary.",
        tokenUsage: { prompt: 12, completion: 3, total: 15 },
        modelId: "test-llm-2024",
      },
    });
  });

  it("reports zero usage and the configured model when the response omits them", async () => {
    const { client } = mockClient(async () => ({
      choices: [{ message: { content: "text" } }],
      usage: null,
    }));
    const gateway = new OpenAIGenerationGateway(client, "test-llm");

    const outcome = await gateway.generate(request);

    expect(outcome.value.tokenUsage).toEqual({ prompt: 0, completion: 0, total: 0 });
    expect(outcome.value.modelId).toBe("test-llm");
  });

  it("raises ServiceError on an empty completion", async () => {
    const { client } = mockClient(async () => ({ choices: [{ message: { content: null } }] }));
    const gateway = new OpenAIGenerationGateway(client, "test-llm");

    await expect(gateway.generate(request)).rejects.toThrow(
      new ServiceError("generation", "Generation returned empty response"),
    );
  });

  it("wraps transport failures in ServiceError with the cause", async () => {
    const cause = new Error("socket hang up");
    const { client } = mockClient(async () => {
      throw cause;
    });
    const gateway = new OpenAIGenerationGateway(client, "test-llm");

    const err = await gateway.generate(request).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServiceError);
    expect(err).toMatchObject({
      service: "generation",
      code: "SERVICE_UNAVAILABLE",
      message: "Generation request failed: socket hang up",
      cause,
      statusCode: undefined,
    });
  });

  it("keeps the HTTP status of SDK errors", async () => {
    const { client } = mockClient(async () => {
      throw new OpenAI.APIError(503, undefined, "Service Unavailable", undefined);
    });
    const gateway = new OpenAIGenerationGateway(client, "test-llm");

    const err = await gateway.generate(request).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ServiceError);
    expect(err).toMatchObject({ statusCode: 503, message: expect.stringMatching(/^Generation status 503: /) });
  });
});

// ─── Offline generation ─────────────────────────────────────────────────────────

describe("offlineContentFor", () => {
  it("returns the script placeholder for script or dialogue prompts", () => {
    expect(offlineContentFor("Write the podcast SCRIPT")).toMatch(/^\*\*Host 1\*\*: Welcome back!/);
    expect(offlineContentFor("Write natural dialogue")).toMatch(/^\*\*Host 1\*\*/);
  });

  it("prefers the script placeholder when both keyword groups match", () => {
    expect(offlineContentFor("Turn this research paper analysis into a script")).toMatch(/^\*\*Host 1\*\*/);
  });

  it("returns the analysis placeholder for paper analysis prompts", () => {
    expect(offlineContentFor("Analyze this research paper")).toMatch(/^Analysis of the research paper:/);
    expect(offlineContentFor("Give an ANALYSIS")).toMatch(/^Analysis of the research paper:/);
  });

  it("echoes the first 100 characters of any other prompt", () => {
    expect(offlineContentFor("  Hello there  ")).toBe("Offline placeholder response for: Hello there");
    const long = "x".repeat(150);
    expect(offlineContentFor(long)).toBe(`Offline placeholder response for: ${"x".repeat(100)}`);
  });
});

describe("OfflineGenerationGateway", () => {
  it("always answers degraded with word-count token usage", async () => {
    const gateway = new OfflineGenerationGateway();

    const outcome = await gateway.generate({ prompt: "one two three", maxTokens: 10, temperature: 0 });

    expect(outcome).toEqual({
      status: "degraded",
      reason: "offline mode",
      value: {
        content: "Offline placeholder response for: one two three",
        tokenUsage: { prompt: 3, completion: 7, total: 10 },
        modelId: OFFLINE_MODEL_ID,
      },
    });
  });

  it("uses the configured reason", async () => {
    const gateway = new OfflineGenerationGateway("NIM_API_KEY not set");
    const outcome = await gateway.generate(request);
    expect(outcome).toMatchObject({ status: "degraded", reason: "NIM_API_KEY not set" });
  });
});

// ─── withGenerationFallback ─────────────────────────────────────────────────────

describe("withGenerationFallback", () => {
  function failingGateway(err: Error): GenerationGateway {
    return {
      modelId: "test-llm",
      generate: vi.fn(async (): Promise<Outcome<GenerationResponse>> => {
        throw err;
      }),
    };
  }

  it("passes successful responses through unchanged", async () => {
    const success: Outcome<GenerationResponse> = {
      status: "success",
      value: { content: "real", tokenUsage: { prompt: 1, completion: 1, total: 2 }, modelId: "test-llm" },
    };
    const primary: GenerationGateway = { modelId: "test-llm", generate: vi.fn(async () => success) };
    const logger = createSilentLogger();
    const gateway = withGenerationFallback(primary, new OfflineGenerationGateway(), logger);

    expect(await gateway.generate(request)).toEqual(success);
    expect(gateway.modelId).toBe("test-llm");
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("substitutes offline text tagged with the failure reason on ServiceError", async () => {
    const primary = failingGateway(new ServiceError("generation", "Generation status 503: busy"));
    const logger = createSilentLogger();
    const gateway = withGenerationFallback(primary, new OfflineGenerationGateway(), logger);

    const outcome = await gateway.generate({ prompt: "one two three", maxTokens: 10, temperature: 0 });

    expect(outcome).toEqual({
      status: "degraded",
      reason: "Generation status 503: busy",
      value: {
        content: "Offline placeholder response for: one two three",
        tokenUsage: { prompt: 3, completion: 7, total: 10 },
        modelId: OFFLINE_MODEL_ID,
      },
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("rethrows errors that are not ServiceError", async () => {
    const primary = failingGateway(new TypeError("bad request shape"));
    const gateway = withGenerationFallback(primary, new OfflineGenerationGateway(), createSilentLogger());

    await expect(gateway.generate(request)).rejects.toThrow(TypeError);
  });
});
