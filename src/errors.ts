// Paper Script Pipeline - Error taxonomy
//
// Gateway failures, contract violations and aborted runs each get their own
// class so the server and callers can branch on `code` without string
// matching. Degenerate inputs (empty text, zero vectors) are not errors.

import type { Phase } from "./types.js";

export type ErrorCode =
  | "SERVICE_UNAVAILABLE"
  | "DIMENSION_MISMATCH"
  | "PHASE_FAILED"
  | "FACT_CHECK_UNAVAILABLE"
  | "BUDGET_EXCEEDED"
  | "INVALID_SOURCE"
  | "UNKNOWN_STYLE";

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  cause?: string;
}

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

export type ServiceName = "generation" | "embedding";

/** Transport or backend failure from a gateway. Never retried inside the pipeline. */
export class ServiceError extends PipelineError {
  readonly service: ServiceName;
  readonly statusCode?: number;

  constructor(
    service: ServiceName,
    message: string,
    options?: { cause?: unknown; statusCode?: number },
  ) {
    super(message, "SERVICE_UNAVAILABLE", options);
    this.name = "ServiceError";
    this.service = service;
    this.statusCode = options?.statusCode;
  }
}

export class DimensionMismatchError extends PipelineError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Vector dimension mismatch: ${expected} vs ${actual}`, "DIMENSION_MISMATCH");
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** A generation step failed; the run is aborted. `phase` is "script" for the synthesis call. */
export class PhaseFailedError extends PipelineError {
  readonly phase: Phase | "script";
  readonly completedPhases: Phase[];

  constructor(phase: Phase | "script", completedPhases: Phase[], cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Pipeline failed during ${phase}: ${reason}`, "PHASE_FAILED", { cause });
    this.name = "PhaseFailedError";
    this.phase = phase;
    this.completedPhases = completedPhases;
  }
}

/**
 * The fact check could not be computed. Distinct from a report whose status
 * is "FAILED", which is a successful computation with a low score.
 */
export class FactCheckUnavailableError extends PipelineError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Validation report unavailable: ${reason}`, "FACT_CHECK_UNAVAILABLE", { cause });
    this.name = "FactCheckUnavailableError";
  }
}

export class BudgetExceededError extends PipelineError {
  readonly used: number;
  readonly limit: number;

  constructor(used: number, limit: number) {
    super(`Token budget exhausted: ${used} of ${limit} tokens used`, "BUDGET_EXCEEDED");
    this.name = "BudgetExceededError";
    this.used = used;
    this.limit = limit;
  }
}

export class InvalidSourceError extends PipelineError {
  constructor(message: string) {
    super(message, "INVALID_SOURCE");
    this.name = "InvalidSourceError";
  }
}

export class UnknownStyleError extends PipelineError {
  readonly style: string;
  readonly available: string[];

  constructor(style: string, available: string[]) {
    super(`Unknown podcast style "${style}". Available styles: ${available.join(", ")}`, "UNKNOWN_STYLE");
    this.name = "UnknownStyleError";
    this.style = style;
    this.available = available;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
