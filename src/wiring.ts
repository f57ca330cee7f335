// Paper Script Pipeline - Component wiring
// Builds gateways, fact checker, orchestrator and persistence from an AppConfig.
// No side effects on import; index.ts is the module that starts the server.

import OpenAI from "openai";
import type { AppConfig } from "./config.js";
import {
  OfflineEmbeddingGateway,
  OpenAIEmbeddingGateway,
  withEmbeddingFallback,
  type EmbeddingGateway,
  type OpenAIEmbeddingClient,
} from "./embedding-gateway.js";
import { FactChecker } from "./fact-checker.js";
import { FilePersistence } from "./file-persistence.js";
import {
  OfflineGenerationGateway,
  OpenAIGenerationGateway,
  withGenerationFallback,
  type GenerationGateway,
  type OpenAIChatClient,
} from "./generation-gateway.js";
import { createConsoleLogger } from "./logging.js";
import { PipelineOrchestrator } from "./pipeline-orchestrator.js";
import type { GatewayMode } from "./server.js";

/** The client surface both online gateways need. */
export type NimClient = OpenAIChatClient & OpenAIEmbeddingClient;

export interface Components {
  mode: GatewayMode;
  generation: GenerationGateway;
  embeddings: EmbeddingGateway;
  factChecker: FactChecker;
  orchestrator: PipelineOrchestrator;
  persistence: FilePersistence;
}

function createNimClient(config: AppConfig, apiKey: string): NimClient {
  const client = new OpenAI({ apiKey, baseURL: config.baseUrl, timeout: config.requestTimeoutMs });
  return client as unknown as NimClient;
}

/**
 * Without an API key both gateways run offline and every result is tagged
 * "degraded". With a key, `offlineFallback` wraps each online gateway so a
 * ServiceError is answered offline instead of failing the run.
 */
export function createComponents(
  config: AppConfig,
  clientFactory: (config: AppConfig, apiKey: string) => NimClient = createNimClient,
): Components {
  const gatewayLogger = createConsoleLogger("Gateway");
  let mode: GatewayMode;
  let generation: GenerationGateway;
  let embeddings: EmbeddingGateway;

  if (config.apiKey === null) {
    mode = "offline";
    const reason = "offline mode: NIM_API_KEY not set";
    generation = new OfflineGenerationGateway(reason);
    embeddings = new OfflineEmbeddingGateway(config.embeddingDimension, reason);
  } else {
    mode = "online";
    const client = clientFactory(config, config.apiKey);
    generation = new OpenAIGenerationGateway(client, config.llmModel);
    embeddings = new OpenAIEmbeddingGateway(client, config.embeddingModel, config.embeddingDimension);
    if (config.offlineFallback) {
      generation = withGenerationFallback(generation, new OfflineGenerationGateway(), gatewayLogger);
      embeddings = withEmbeddingFallback(
        embeddings,
        new OfflineEmbeddingGateway(config.embeddingDimension),
        gatewayLogger,
      );
    }
  }

  const factChecker = new FactChecker(embeddings, config.factCheck);
  const orchestrator = new PipelineOrchestrator({
    generation,
    factChecker,
    maxTotalTokens: config.maxTotalTokens,
  });

  return {
    mode,
    generation,
    embeddings,
    factChecker,
    orchestrator,
    persistence: new FilePersistence(config.outputDir),
  };
}
