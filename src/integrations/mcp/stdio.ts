#!/usr/bin/env node
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "../../core/config/index.js";
import { errorMessage } from "../../core/errors.js";
import { createLogger } from "../../core/logger.js";
import { DocumentOrchestrator } from "../../core/pipeline/orchestrator.js";
import { createGenerationClient } from "../../providers/index.js";
import { McpAdapter } from "./mcpAdapter.js";
import { createMcpServer } from "./mcpServer.js";

const logger = createLogger("mcp-server");

async function main(): Promise<void> {
  const config = loadConfig();

  const client = createGenerationClient(config.llm);
  await client.initialize();

  const adapter = new McpAdapter(new DocumentOrchestrator({ client }));
  const server = createMcpServer(adapter);

  await server.connect(new StdioServerTransport());
  logger.info({ model: client.modelName }, "Docsmith MCP server listening on stdio");
}

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, "Failed to start MCP server");
  process.exit(1);
});
