import type { CallToolResult, GetPromptResult } from "@modelcontextprotocol/sdk/types.js";
import type { DocumentOrchestrator } from "../../core/pipeline/orchestrator.js";
import {
  GenerationRequestSchema,
  type DocumentType,
  type GenerationResponse,
} from "../../core/schemas/index.js";
import { ValidationError, errorMessage } from "../../core/errors.js";
import { createLogger } from "../../core/logger.js";
import {
  GenerateDocumentsArgsSchema,
  ProjectPromptArgsSchema,
  SingleDocumentArgsSchema,
  mcpPromptDefinitions,
  mcpToolDefinitions,
} from "./mcp.schema.js";

const logger = createLogger("mcp-adapter");

const SINGLE_DOCUMENT_TOOLS: Record<string, DocumentType> = {
  generate_prd: "prd",
  generate_readme: "readme",
  generate_overview: "what_is_this",
};

/** "what_is_this" → "What Is This" */
export function documentLabel(documentType: DocumentType): string {
  return documentType
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

function text(value: string): CallToolResult["content"][number] {
  return { type: "text", text: value };
}

function failure(message: string): CallToolResult {
  return { content: [text(message)], isError: true };
}

/**
 * McpAdapter – bridge between MCP tool/prompt calls and the
 * document orchestrator. Transport-free so it can be driven directly.
 */
export class McpAdapter {
  constructor(private readonly orchestrator: DocumentOrchestrator) {}

  listTools() {
    return mcpToolDefinitions;
  }

  listPrompts() {
    return mcpPromptDefinitions;
  }

  async callTool(name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
    logger.info({ tool: name }, "MCP tool call received");

    try {
      if (name === "generate_documents") {
        return await this.generateDocuments(args);
      }
      const documentType = SINGLE_DOCUMENT_TOOLS[name];
      if (documentType !== undefined) {
        return await this.generateSingleDocument(args, documentType);
      }
      return failure(`Unknown tool: ${name}`);
    } catch (error) {
      const message = errorMessage(error);
      logger.error({ tool: name, error: message }, "Error in tool call");
      return failure(`Error: ${message}`);
    }
  }

  getPrompt(name: string, args: Record<string, string> = {}): GetPromptResult {
    const { project_description, project_name } = ProjectPromptArgsSchema.parse(args);

    if (name === "project_documentation") {
      return {
        description: "Generate comprehensive project documentation",
        messages: [
          {
            role: "user",
            content: {
              type: "text",
              text:
                `Please generate comprehensive documentation for my project '${project_name}'. ` +
                `Here's the project description: ${project_description}\n\n` +
                "I need a complete set of documentation including:\n" +
                "1. Product Requirements Document (PRD)\n" +
                "2. Project Overview (What-is-this)\n" +
                "3. README.md file\n\n" +
                "Use the generate_documents tool to create all three document types.",
            },
          },
        ],
      };
    }

    if (name === "prd_template") {
      return {
        description: "Generate a Product Requirements Document",
        messages: [
          {
            role: "user",
            content: {
              type: "text",
              text:
                `Please generate a Product Requirements Document for '${project_name}'. ` +
                `Project description: ${project_description}\n\n` +
                "Use the generate_prd tool to create a comprehensive PRD.",
            },
          },
        ],
      };
    }

    throw new ValidationError(`Unknown prompt: ${name}`);
  }

  private async generateDocuments(args: Record<string, unknown>): Promise<CallToolResult> {
    const parsed = GenerateDocumentsArgsSchema.parse(args);
    const response = await this.run(parsed.input_text, parsed.document_types, parsed.project_name);

    const summary = `Generated ${response.documents.length} documents in ${response.generationTime.toFixed(2)} seconds`;
    return {
      content: [
        text(`# Document Generation Complete\n\n${summary}\n\n`),
        ...response.documents.map((doc) =>
          text(`## ${documentLabel(doc.documentType)}\n\n${doc.content}\n\n---\n`),
        ),
      ],
    };
  }

  private async generateSingleDocument(
    args: Record<string, unknown>,
    documentType: DocumentType,
  ): Promise<CallToolResult> {
    const parsed = SingleDocumentArgsSchema.parse(args);
    const response = await this.run(parsed.input_text, [documentType], parsed.project_name);

    const doc = response.documents[0];
    return { content: [text(doc ? doc.content : "No document generated")] };
  }

  private async run(
    inputText: string,
    documentTypes: DocumentType[],
    projectName: string | null | undefined,
  ): Promise<GenerationResponse> {
    const request = GenerationRequestSchema.safeParse({
      inputText,
      documentTypes,
      projectName: projectName || undefined,
    });
    if (!request.success) {
      const message = request.error.issues.map((issue) => issue.message).join("; ");
      throw new ValidationError(message);
    }
    return this.orchestrator.generateDocuments(request.data);
  }
}
