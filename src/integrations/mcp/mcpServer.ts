import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { McpAdapter } from "./mcpAdapter.js";

export const MCP_SERVER_NAME = "docsmith";
export const MCP_SERVER_VERSION = "0.1.0";

/**
 * Register the adapter's tools and prompts on an MCP server.
 * The caller connects it to a transport.
 */
export function createMcpServer(adapter: McpAdapter): Server {
  const server = new Server(
    { name: MCP_SERVER_NAME, version: MCP_SERVER_VERSION },
    { capabilities: { tools: {}, prompts: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: adapter.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    adapter.callTool(request.params.name, request.params.arguments),
  );

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: adapter.listPrompts(),
  }));

  server.setRequestHandler(GetPromptRequestSchema, async (request) =>
    adapter.getPrompt(request.params.name, request.params.arguments),
  );

  return server;
}
