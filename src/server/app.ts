import Fastify, { type FastifyInstance } from "fastify";
import type { DocumentOrchestrator } from "../core/pipeline/orchestrator.js";
import type { GenerationClient } from "../providers/llm-provider.js";
import { DEFAULT_LOG_LEVEL, type LogLevel } from "../core/config/index.js";
import { registerGenerationRoutes } from "./generationRoutes.js";

export const API_PREFIX = "/api/v1";

export interface ServerDeps {
  client: GenerationClient;
  orchestrator: DocumentOrchestrator;
  /** Fastify request logging (default: true). */
  logger?: boolean;
  logLevel?: LogLevel;
}

/**
 * Build the HTTP application around an already constructed client and
 * orchestrator. Start-up code owns initialization; the routes only read.
 */
export function buildServer(deps: ServerDeps): FastifyInstance {
  const fastify = Fastify({
    logger: deps.logger === false ? false : { level: deps.logLevel ?? DEFAULT_LOG_LEVEL },
  });

  registerGenerationRoutes(
    fastify,
    { client: deps.client, orchestrator: deps.orchestrator },
    API_PREFIX,
  );

  return fastify;
}
