import "dotenv/config";
import { buildServer } from "./app.js";
import { loadConfig } from "../core/config/index.js";
import { errorMessage } from "../core/errors.js";
import { createLogger } from "../core/logger.js";
import { DocumentOrchestrator } from "../core/pipeline/orchestrator.js";
import { createGenerationClient } from "../providers/index.js";

const logger = createLogger("server");

async function main(): Promise<void> {
  const config = loadConfig();

  // The client must be connected before any request can reach the orchestrator.
  const client = createGenerationClient(config.llm);
  await client.initialize();

  const orchestrator = new DocumentOrchestrator({ client });
  const server = buildServer({ client, orchestrator, logLevel: config.logLevel });

  await server.listen({ port: config.server.port, host: config.server.host });
  logger.info(
    { host: config.server.host, port: config.server.port, model: client.modelName },
    "Docsmith server running",
  );
}

main().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, "Failed to start server");
  process.exit(1);
});
