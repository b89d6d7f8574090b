import type { FastifyInstance } from "fastify";
import type { DocumentOrchestrator } from "../core/pipeline/orchestrator.js";
import type { GenerationClient } from "../providers/llm-provider.js";
import { NotInitializedError, ValidationError, errorMessage } from "../core/errors.js";
import { charLength } from "../core/schemas/index.js";
import {
  generateBodyJsonSchema,
  toGenerateResponseWire,
  toGenerationRequest,
  toMemoryUsageWire,
  toModelInfoWire,
  type GenerateBody,
} from "./generation.schema.js";

export interface GenerationRouteDeps {
  client: GenerationClient;
  orchestrator: DocumentOrchestrator;
}

/**
 * Register the document generation API.
 *
 * POST <prefix>/generate – generate one document per requested type
 * GET  <prefix>/health   – readiness of the model server connection
 * GET  <prefix>/metrics  – model loaded flag, model info and memory snapshot
 */
export function registerGenerationRoutes(
  fastify: FastifyInstance,
  deps: GenerationRouteDeps,
  prefix = "/api/v1",
): void {
  const { client, orchestrator } = deps;

  // ── POST /generate ────────────────────────────────────────────────
  fastify.post<{ Body: GenerateBody }>(`${prefix}/generate`, {
    schema: { body: generateBodyJsonSchema },
    handler: async (req, reply) => {
      try {
        const request = toGenerationRequest(req.body);

        req.log.info(
          {
            documentTypes: request.documentTypes,
            projectName: request.projectName,
            inputLength: charLength(request.inputText),
          },
          "Received generation request",
        );

        const response = await orchestrator.generateDocuments(request);

        req.log.info(
          {
            documentsGenerated: response.documents.length,
            generationTime: response.generationTime,
          },
          "Generation completed",
        );

        return reply.code(200).send(toGenerateResponseWire(response));
      } catch (error) {
        if (error instanceof ValidationError) {
          return reply.code(400).send({ error: error.message });
        }
        if (error instanceof NotInitializedError) {
          return reply.code(503).send({ error: error.message });
        }
        const message = errorMessage(error);
        req.log.error({ error: message }, "Unexpected error during generation");
        return reply.code(500).send({ error: `Internal server error: ${message}` });
      }
    },
  });

  // ── GET /health ───────────────────────────────────────────────────
  fastify.get(`${prefix}/health`, async (_req, reply) => {
    // Not-ready is a status in the body, not a failed request.
    if (!client.isLoaded) {
      return reply.code(200).send({
        status: "model_not_loaded",
        message: "Docsmith is running but model is not loaded",
        model_loaded: false,
        memory_usage: null,
      });
    }

    return reply.code(200).send({
      status: "healthy",
      message: "Docsmith is running and model is loaded",
      model_loaded: true,
      memory_usage: toMemoryUsageWire(client.getMemoryUsage()),
    });
  });

  // ── GET /metrics ──────────────────────────────────────────────────
  fastify.get(`${prefix}/metrics`, async (_req, reply) => {
    return reply.code(200).send({
      model_loaded: client.isLoaded ? 1 : 0,
      model_info: toModelInfoWire(client.getModelInfo()),
      memory_usage: toMemoryUsageWire(client.getMemoryUsage()),
    });
  });
}
