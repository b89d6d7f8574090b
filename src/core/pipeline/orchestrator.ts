import { v4 as uuidv4 } from "uuid";
import {
  charLength,
  type DocumentType,
  type GeneratedDocument,
  type GenerationRequest,
  type GenerationResponse,
} from "../schemas/index.js";
import { buildPrompt, samplingParamsFor } from "../prompts/index.js";
import { NotInitializedError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import type { GenerationClient } from "../../providers/llm-provider.js";

const logger = createLogger("orchestrator");

export interface OrchestratorConfig {
  client: GenerationClient;
}

/**
 * Document Orchestrator
 * Fans out one generation call per requested document type, waits for all
 * of them to settle and assembles the response in request order.
 *
 * A failed call becomes an error placeholder in its own slot; it never
 * cancels its siblings or fails the batch.
 */
export class DocumentOrchestrator {
  private readonly client: GenerationClient;

  constructor(config: OrchestratorConfig) {
    this.client = config.client;
  }

  async generateDocuments(request: GenerationRequest): Promise<GenerationResponse> {
    if (!this.client.isLoaded) {
      throw new NotInitializedError(this.client.name);
    }

    const batchId = uuidv4();
    const startedAt = Date.now();

    logger.info(
      {
        batchId,
        documentTypes: request.documentTypes,
        projectName: request.projectName,
        inputLength: charLength(request.inputText),
      },
      "Starting document generation",
    );

    // Promise.all keeps input order; each task turns its own failure into a value.
    const documents = await Promise.all(
      request.documentTypes.map((documentType) =>
        this.generateSingle(batchId, request, documentType).catch((error: unknown) =>
          this.errorDocument(batchId, documentType, error),
        ),
      ),
    );

    const generationTime = (Date.now() - startedAt) / 1000;

    logger.info(
      { batchId, totalDocuments: documents.length, generationTime },
      "Document generation completed",
    );

    return {
      documents,
      generationTime,
      modelInfo: this.client.getModelInfo(),
    };
  }

  private async generateSingle(
    batchId: string,
    request: GenerationRequest,
    documentType: DocumentType,
  ): Promise<GeneratedDocument> {
    logger.debug({ batchId, documentType }, "Generating document");

    const prompt = buildPrompt(request.inputText, documentType, request.projectName);
    const content = await this.client.generate(prompt, samplingParamsFor(documentType));

    return {
      documentType,
      content,
      metadata: {
        generated_at: new Date().toISOString(),
        project_name: request.projectName ?? null,
        input_length: charLength(request.inputText),
        output_length: charLength(content),
        model: this.client.modelName,
        ...request.additionalContext,
      },
    };
  }

  private errorDocument(
    batchId: string,
    documentType: DocumentType,
    error: unknown,
  ): GeneratedDocument {
    const message = errorMessage(error);
    logger.error({ batchId, documentType, error: message }, "Failed to generate document");

    return {
      documentType,
      content: `# Error\n\nFailed to generate ${documentType}: ${message}`,
      metadata: { error: true, error_message: message },
    };
  }
}
