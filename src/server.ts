// Paper Script Pipeline - HTTP routes, WebSocket handler and Express server
//
// HTTP:
//   GET  /health          → { status, mode }
//   GET  /api/styles      → podcast styles a run can be prompted with
//   POST /api/pipeline    → full run; maps PipelineError codes to status codes
//   POST /api/fact-check  → standalone ValidationReport
//
// WebSocket: one message { type: "start_pipeline", sourceText, save?, style? }
// starts a run; progress events are streamed back, then pipeline_complete or
// pipeline_error. Runs live in memory only; nothing is written to disk unless
// `save` is set, and a failed save is reported in `saveError` next to the
// output.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import {
  BudgetExceededError,
  DimensionMismatchError,
  FactCheckUnavailableError,
  InvalidSourceError,
  PhaseFailedError,
  ServiceError,
  UnknownStyleError,
  errorMessage,
  isPipelineError,
} from "./errors.js";
import type { FactChecker } from "./fact-checker.js";
import { FilePersistence } from "./file-persistence.js";
import { createConsoleLogger, type Logger } from "./logging.js";
import { DEFAULT_STYLE_ID, isStyleId, listStyleIds, listStyles } from "./styles.js";
import type { PipelineOrchestrator, PipelineRun } from "./pipeline-orchestrator.js";
import type { ClientMessage, FactCheckOptions, PipelineOutput, ServerMessage } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Papers are sent inline as JSON; allow for long full texts. */
const MAX_BODY_SIZE = "5mb";

export type GatewayMode = "online" | "offline";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  orchestrator: PipelineOrchestrator;
  factChecker: FactChecker;
  /** Where `save: true` requests write their outputs. Defaults to ./output. */
  persistence?: FilePersistence;
  /** Reported by /health. */
  mode?: GatewayMode;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Resolves once listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    orchestrator,
    factChecker,
    persistence = new FilePersistence("output"),
    mode = "online",
    logger = createConsoleLogger("Server"),
  } = options;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json({ limit: MAX_BODY_SIZE }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", mode });
  });

  app.get("/api/styles", (_req, res) => {
    res.json({
      default: DEFAULT_STYLE_ID,
      styles: listStyles().map(({ id, name, description, useCase }) => ({ id, name, description, useCase })),
    });
  });

  app.post(
    "/api/pipeline",
    asyncHandler(async (req, res) => {
      const body = parsePipelineRequest(req.body);
      if (typeof body === "string") {
        res.status(400).json({ error: body });
        return;
      }

      const output = await orchestrator.run(body.sourceText, { style: body.style });
      const saved = await saveOutputs(output, body.save, persistence, logger);
      res.json({ ...output, ...saved });
    }),
  );

  app.post(
    "/api/fact-check",
    asyncHandler(async (req, res) => {
      const body = parseFactCheckRequest(req.body);
      if (typeof body === "string") {
        res.status(400).json({ error: body });
        return;
      }

      const report = await factChecker.validate(body.generatedText, body.sourceText, body.options);
      res.json(report);
    }),
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = errorResponse(err);
    if (status >= 500) {
      logger.error(`Request failed (${status}): ${errorMessage(err)}`);
    } else {
      logger.warn(`Request rejected (${status}): ${errorMessage(err)}`);
    }
    res.status(status).json(body);
  });

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, orchestrator, persistence, logger);
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

function asyncHandler(
  fn: (req: Request, res: Response) => Promise<void>,
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

// ─── Error mapping ──────────────────────────────────────────────────────────────

export interface ErrorResponse {
  status: number;
  body: Record<string, unknown>;
}

/** Maps an error raised while serving a request to a status code and JSON body. */
export function errorResponse(err: unknown): ErrorResponse {
  if (err instanceof PhaseFailedError) {
    return {
      status: 502,
      body: { error: err.message, code: err.code, phase: err.phase, completedPhases: err.completedPhases },
    };
  }
  if (err instanceof UnknownStyleError) {
    return { status: 400, body: { error: err.message, code: err.code, available: err.available } };
  }
  if (err instanceof InvalidSourceError) {
    return { status: 400, body: { error: err.message, code: err.code } };
  }
  if (err instanceof BudgetExceededError) {
    return { status: 429, body: { error: err.message, code: err.code, used: err.used, limit: err.limit } };
  }
  if (err instanceof FactCheckUnavailableError) {
    return { status: 503, body: { error: err.message, code: err.code } };
  }
  if (err instanceof ServiceError || err instanceof DimensionMismatchError) {
    return { status: 502, body: { error: err.message, code: err.code } };
  }
  // body-parser rejects malformed JSON with a SyntaxError
  if (err instanceof SyntaxError) {
    return { status: 400, body: { error: "Request body is not valid JSON" } };
  }
  if (err instanceof Error && "status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    return { status: err.status, body: { error: err.message } };
  }
  return { status: 500, body: { error: errorMessage(err) } };
}

// ─── Request validation ─────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface PipelineRequest {
  sourceText: string;
  save: boolean;
  style: string;
}

/** Returns the parsed request, or a message describing what is wrong with it. */
export function parsePipelineRequest(body: unknown): PipelineRequest | string {
  if (!isRecord(body)) return "Request body must be a JSON object";
  if (typeof body.sourceText !== "string") return "sourceText must be a string";
  if (body.save !== undefined && typeof body.save !== "boolean") return "save must be a boolean";
  if (body.style !== undefined && (typeof body.style !== "string" || !isStyleId(body.style))) {
    return `style must be one of: ${listStyleIds().join(", ")}`;
  }
  return {
    sourceText: body.sourceText,
    save: body.save === true,
    style: typeof body.style === "string" ? body.style : DEFAULT_STYLE_ID,
  };
}

export interface FactCheckRequest {
  generatedText: string;
  sourceText: string;
  options: Partial<FactCheckOptions>;
}

export function parseFactCheckRequest(body: unknown): FactCheckRequest | string {
  if (!isRecord(body)) return "Request body must be a JSON object";
  if (typeof body.generatedText !== "string") return "generatedText must be a string";
  if (typeof body.sourceText !== "string") return "sourceText must be a string";

  const options: Partial<FactCheckOptions> = {};
  if (body.chunkSize !== undefined) {
    if (typeof body.chunkSize !== "number" || !Number.isInteger(body.chunkSize) || body.chunkSize <= 0) {
      return "chunkSize must be a positive integer";
    }
    options.chunkSize = body.chunkSize;
  }
  for (const key of ["validThreshold", "passThreshold"] as const) {
    const value = body[key];
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
      return `${key} must be a number between 0 and 1`;
    }
    options[key] = value;
  }

  return { generatedText: body.generatedText, sourceText: body.sourceText, options };
}

/** Parses one text frame from a client, or returns null if it is not a known message. */
export function parseClientMessage(text: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || parsed.type !== "start_pipeline") return null;
  const request = parsePipelineRequest(parsed);
  if (typeof request === "string") return null;
  return { type: "start_pipeline", sourceText: request.sourceText, save: request.save, style: request.style };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  orchestrator: PipelineOrchestrator,
  persistence: FilePersistence,
  logger: Logger,
): void {
  let activeRunId: string | null = null;

  logger.info("New WebSocket connection");

  ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
    if (isBinary) {
      sendMessage(ws, { type: "error", message: "Binary frames are not supported." });
      return;
    }

    const message = parseClientMessage(data.toString());
    if (!message) {
      sendMessage(ws, {
        type: "error",
        message: `Expected {"type":"start_pipeline","sourceText":string,"save"?:boolean,"style"?:string}. Styles: ${listStyleIds().join(", ")}.`,
      });
      return;
    }

    if (activeRunId) {
      sendMessage(ws, { type: "error", message: `Run ${activeRunId} is still in progress.` });
      return;
    }

    const run = orchestrator.createRun(message.sourceText, {
      style: message.style,
      onProgress: (event) => {
        sendMessage(ws, { type: "progress", runId: event.runId, stage: event.stage, progress: event.progress });
      },
    });
    activeRunId = run.id;

    executeRun(ws, run, message.save === true, persistence, logger)
      .catch((err: unknown) => {
        logger.error(`Run ${run.id}: could not report result: ${errorMessage(err)}`);
      })
      .finally(() => {
        activeRunId = null;
      });
  });

  ws.on("close", () => {
    logger.info("WebSocket closed");
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error: ${err.message}`);
  });
}

async function executeRun(
  ws: WebSocket,
  run: PipelineRun,
  save: boolean,
  persistence: FilePersistence,
  logger: Logger,
): Promise<void> {
  let output: PipelineOutput;
  try {
    output = await run.execute();
  } catch (err) {
    logger.error(`Run ${run.id} failed: ${errorMessage(err)}`);
    sendMessage(ws, {
      type: "pipeline_error",
      code: isPipelineError(err) ? err.code : "INTERNAL",
      message: errorMessage(err),
      ...(err instanceof PhaseFailedError ? { phase: err.phase } : {}),
      completedPhases: run.phaseResults.map((r) => r.phase),
    });
    return;
  }

  const saved = await saveOutputs(output, save, persistence, logger);
  sendMessage(ws, { type: "pipeline_complete", output, ...saved });
}

export interface SaveOutcome {
  savedPaths?: string[];
  saveError?: string;
}

/**
 * Writes a finished run to disk when asked to. A write failure is reported in
 * `saveError` alongside the output instead of discarding the run.
 */
export async function saveOutputs(
  output: PipelineOutput,
  save: boolean,
  persistence: FilePersistence,
  logger: Logger,
): Promise<SaveOutcome> {
  if (!save) return {};
  try {
    return { savedPaths: await persistence.saveRun(output) };
  } catch (err) {
    logger.error(`Run ${output.runId}: could not save outputs: ${errorMessage(err)}`);
    return { saveError: `Failed to save outputs: ${errorMessage(err)}` };
  }
}

// ─── Message Sending ────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
