import { z } from "zod";
import {
  ALL_DOCUMENT_TYPES,
  DocumentTypeSchema,
  GenerationRequestSchema,
  type GenerationRequest,
  type GenerationResponse,
  type MemoryUsage,
  type ModelInfo,
} from "../core/schemas/index.js";
import { ValidationError } from "../core/errors.js";

// ── POST /api/v1/generate body ────────────────────────────────────────
export const GenerateBodySchema = z.object({
  input_text: z.string(),
  document_types: z.array(DocumentTypeSchema).default([...ALL_DOCUMENT_TYPES]),
  project_name: z.string().nullish(),
  additional_context: z.record(z.unknown()).nullish(),
});
export type GenerateBody = z.input<typeof GenerateBodySchema>;

/** JSON schema handed to Fastify; zod does the semantic checks. */
export const generateBodyJsonSchema = {
  type: "object",
  required: ["input_text"],
  properties: {
    input_text: { type: "string" },
    document_types: { type: "array", items: { type: "string" } },
    project_name: { type: "string", nullable: true },
    additional_context: { type: "object", nullable: true },
  },
} as const;

/** Parse a wire body into a core request, or throw ValidationError. */
export function toGenerationRequest(body: unknown): GenerationRequest {
  const wire = GenerateBodySchema.safeParse(body);
  if (!wire.success) {
    throw zodToValidationError(wire.error);
  }

  const request = GenerationRequestSchema.safeParse({
    inputText: wire.data.input_text,
    documentTypes: wire.data.document_types,
    projectName: wire.data.project_name || undefined,
    additionalContext: wire.data.additional_context ?? {},
  });
  if (!request.success) {
    throw zodToValidationError(request.error);
  }
  return request.data;
}

function zodToValidationError(error: z.ZodError): ValidationError {
  const issues = error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
  // Refinement messages on the input text read as complete sentences already.
  const first = error.issues[0];
  const message =
    first && first.code === z.ZodIssueCode.custom ? first.message : issues.join("; ");
  return new ValidationError(message, issues);
}

// ── Response shapes ───────────────────────────────────────────────────
export interface ModelInfoWire {
  model_name: string;
  loaded: boolean;
  service: string;
  base_url: string;
}

export interface GenerateResponseWire {
  documents: Array<{
    document_type: string;
    content: string;
    metadata: Record<string, unknown>;
  }>;
  generation_time: number;
  model_info: ModelInfoWire;
}

export interface MemoryUsageWire {
  service: string;
  local_service: boolean;
  memory_info: string;
}

export function toModelInfoWire(info: ModelInfo): ModelInfoWire {
  return {
    model_name: info.modelName,
    loaded: info.loaded,
    service: info.service,
    base_url: info.baseUrl,
  };
}

export function toMemoryUsageWire(usage: MemoryUsage): MemoryUsageWire {
  return {
    service: usage.service,
    local_service: usage.localService,
    memory_info: usage.memoryInfo,
  };
}

export function toGenerateResponseWire(response: GenerationResponse): GenerateResponseWire {
  return {
    documents: response.documents.map((doc) => ({
      document_type: doc.documentType,
      content: doc.content,
      metadata: doc.metadata,
    })),
    generation_time: response.generationTime,
    model_info: toModelInfoWire(response.modelInfo),
  };
}
