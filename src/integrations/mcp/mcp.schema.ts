import { z } from "zod";
import type { Prompt, Tool } from "@modelcontextprotocol/sdk/types.js";
import { ALL_DOCUMENT_TYPES, DocumentTypeSchema } from "../../core/schemas/index.js";

// ── Tool arguments ────────────────────────────────────────────────────
export const SingleDocumentArgsSchema = z.object({
  input_text: z.string(),
  project_name: z.string().nullish(),
});
export type SingleDocumentArgs = z.infer<typeof SingleDocumentArgsSchema>;

export const GenerateDocumentsArgsSchema = SingleDocumentArgsSchema.extend({
  document_types: z.array(DocumentTypeSchema).default([...ALL_DOCUMENT_TYPES]),
});
export type GenerateDocumentsArgs = z.infer<typeof GenerateDocumentsArgsSchema>;

// ── Prompt arguments ──────────────────────────────────────────────────
export const ProjectPromptArgsSchema = z.object({
  project_description: z.string().default(""),
  project_name: z.string().default("My Project"),
});
export type ProjectPromptArgs = z.infer<typeof ProjectPromptArgsSchema>;

// ── Definitions advertised to MCP clients ─────────────────────────────
const inputTextProperty = {
  type: "string",
  description: "Project description or requirements",
};
const projectNameProperty = {
  type: "string",
  description: "Name of the project (optional)",
};

function singleDocumentTool(name: string, description: string): Tool {
  return {
    name,
    description,
    inputSchema: {
      type: "object",
      properties: { input_text: inputTextProperty, project_name: projectNameProperty },
      required: ["input_text"],
    },
  };
}

export const mcpToolDefinitions: Tool[] = [
  {
    name: "generate_documents",
    description:
      "Generate project documentation (PRD, What-is-this, README) from a project description",
    inputSchema: {
      type: "object",
      properties: {
        input_text: inputTextProperty,
        project_name: projectNameProperty,
        document_types: {
          type: "array",
          items: { type: "string", enum: [...ALL_DOCUMENT_TYPES] },
          description: "Types of documents to generate (default: all types)",
          default: [...ALL_DOCUMENT_TYPES],
        },
      },
      required: ["input_text"],
    },
  },
  singleDocumentTool(
    "generate_prd",
    "Generate a Product Requirements Document (PRD) from project description",
  ),
  singleDocumentTool("generate_readme", "Generate a README.md file from project description"),
  singleDocumentTool(
    "generate_overview",
    "Generate a project overview (What-is-this) document from project description",
  ),
];

const projectPromptArguments = (descriptionHint: string): Prompt["arguments"] => [
  { name: "project_description", description: descriptionHint, required: true },
  { name: "project_name", description: "Name of your project", required: false },
];

export const mcpPromptDefinitions: Prompt[] = [
  {
    name: "project_documentation",
    description:
      "Generate comprehensive project documentation including PRD, overview, and README",
    arguments: projectPromptArguments("Brief description of your project"),
  },
  {
    name: "prd_template",
    description: "Generate a Product Requirements Document template",
    arguments: projectPromptArguments("Project requirements and description"),
  },
];
