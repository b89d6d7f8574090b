#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../core/config/index.js";
import { ValidationError, errorMessage } from "../core/errors.js";
import { DocumentOrchestrator } from "../core/pipeline/orchestrator.js";
import type { GenerationRequest } from "../core/schemas/index.js";
import { createGenerationClient } from "../providers/index.js";
import { USAGE, parseCliArgs } from "./args.js";

async function main(): Promise<void> {
  let request: GenerationRequest;
  try {
    request = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ValidationError) {
      console.error(`${error.message}\n${USAGE}`);
      process.exit(1);
    }
    throw error;
  }

  const config = loadConfig();
  const client = createGenerationClient(config.llm);

  console.log("═══════════════════════════════════════════════════════");
  console.log("  Docsmith");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Provider:  ${client.name} (${config.llm.baseUrl})`);
  console.log(`  Documents: ${request.documentTypes.join(", ")}`);
  if (request.projectName) {
    console.log(`  Project:   ${request.projectName}`);
  }
  console.log("───────────────────────────────────────────────────────\n");

  try {
    await client.initialize();
    const orchestrator = new DocumentOrchestrator({ client });
    const response = await orchestrator.generateDocuments(request);

    for (const doc of response.documents) {
      const marker = doc.metadata["error"] === true ? "❌" : "✅";
      console.log(`── ${marker} ${doc.documentType} ${"─".repeat(40)}\n`);
      console.log(doc.content);
      console.log("");
    }

    console.log(
      `Generated ${response.documents.length} documents in ${response.generationTime.toFixed(2)} seconds with ${response.modelInfo.modelName}`,
    );
  } catch (error) {
    console.error(`\n❌ Generation failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(`\n❌ ${errorMessage(error)}`);
  process.exit(1);
});
