// Paper Script Pipeline - Configuration
// Reads process.env (populated by dotenv in the entry point) into a typed config.
// Leaving NIM_API_KEY unset runs both gateways in offline mode.

import type { FactCheckOptions } from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_NIM_BASE_URL = "https://integrate.api.nvidia.com/v1";
export const DEFAULT_LLM_MODEL = "nvidia/llama-3.1-nemotron-nano-8b-v1";
export const DEFAULT_EMBEDDING_MODEL = "nvidia/nv-embedqa-e5-v5";
export const DEFAULT_EMBEDDING_DIMENSION = 1024;

/** Five minutes, matching the ceiling used for long extraction calls. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000;

export const DEFAULT_FACT_CHECK_OPTIONS: FactCheckOptions = {
  chunkSize: 500,
  validThreshold: 0.7,
  passThreshold: 0.75,
};

export const DEFAULT_MAX_TOTAL_TOKENS = 50_000;

export interface AppConfig {
  port: number;
  /** null → offline mode */
  apiKey: string | null;
  baseUrl: string;
  llmModel: string;
  embeddingModel: string;
  embeddingDimension: number;
  requestTimeoutMs: number;
  offlineFallback: boolean;
  factCheck: FactCheckOptions;
  maxTotalTokens: number;
  outputDir: string;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  if (isNaN(value) || String(value) !== raw || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readUnitInterval(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (isNaN(value) || value < 0 || value > 1) {
    throw new Error(`${key} must be a number between 0 and 1, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`${key} must be "true" or "false", got "${raw}"`);
}

/**
 * Build the application config from environment variables.
 * Throws an Error naming the offending variable when a value is malformed.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = env.NIM_API_KEY?.trim();
  return {
    port: readInt(env, "PORT", 3000, 0),
    apiKey: apiKey ? apiKey : null,
    baseUrl: readString(env, "NIM_BASE_URL", DEFAULT_NIM_BASE_URL),
    llmModel: readString(env, "LLM_MODEL", DEFAULT_LLM_MODEL),
    embeddingModel: readString(env, "EMBEDDING_MODEL", DEFAULT_EMBEDDING_MODEL),
    embeddingDimension: readInt(env, "EMBEDDING_DIMENSION", DEFAULT_EMBEDDING_DIMENSION, 1),
    requestTimeoutMs: readInt(env, "REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS, 1),
    offlineFallback: readBoolean(env, "OFFLINE_FALLBACK", false),
    factCheck: {
      chunkSize: readInt(env, "CHUNK_SIZE_WORDS", DEFAULT_FACT_CHECK_OPTIONS.chunkSize, 1),
      validThreshold: readUnitInterval(env, "VALID_THRESHOLD", DEFAULT_FACT_CHECK_OPTIONS.validThreshold),
      passThreshold: readUnitInterval(env, "PASS_THRESHOLD", DEFAULT_FACT_CHECK_OPTIONS.passThreshold),
    },
    maxTotalTokens: readInt(env, "MAX_TOTAL_TOKENS", DEFAULT_MAX_TOTAL_TOKENS, 1),
    outputDir: readString(env, "OUTPUT_DIR", "output"),
  };
}
