// Paper Script Pipeline - Entry point
// Loads configuration, wires the pipeline and starts the server.

import "dotenv/config";
import { loadConfig, type AppConfig } from "./config.js";
import { createAppServer } from "./server.js";
import { createComponents } from "./wiring.js";

export const APP_NAME = "Paper Script Pipeline";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logFatal(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

if (config.apiKey === null) {
  logInit("NIM_API_KEY is not set; running offline (all results tagged degraded)");
} else {
  logInit(`Using ${config.baseUrl} (timeout ${config.requestTimeoutMs}ms)`);
}

// ─── Initialize pipeline components ─────────────────────────────────────────────

logInit("Wiring gateways, FactChecker and PipelineOrchestrator...");
const components = createComponents(config);
logInit(`Generation model: ${components.generation.modelId}`);
logInit(`Embedding model: ${components.embeddings.modelId} (${components.embeddings.dimension} dims)`);
if (config.apiKey !== null && config.offlineFallback) {
  logInit("OFFLINE_FALLBACK enabled: service failures will be answered offline");
}

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  orchestrator: components.orchestrator,
  factChecker: components.factChecker,
  persistence: components.persistence,
  mode: components.mode,
});

server
  .listen(config.port)
  .then(() => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit("Pipeline: assessment → extraction → structure → validation → script → fact check");
    logInit(`Saved outputs go to ${config.outputDir}/`);
  })
  .catch((err: unknown) => {
    logFatal(`Could not start server: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
