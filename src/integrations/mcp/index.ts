export { McpAdapter, documentLabel } from "./mcpAdapter.js";
export { createMcpServer, MCP_SERVER_NAME, MCP_SERVER_VERSION } from "./mcpServer.js";
export {
  GenerateDocumentsArgsSchema,
  type GenerateDocumentsArgs,
  SingleDocumentArgsSchema,
  type SingleDocumentArgs,
  ProjectPromptArgsSchema,
  type ProjectPromptArgs,
  mcpToolDefinitions,
  mcpPromptDefinitions,
} from "./mcp.schema.js";
