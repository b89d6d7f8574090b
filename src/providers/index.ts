/**
 * Provider factory – picks the generation backend from configuration.
 *
 *   LLM_PROVIDER=lmstudio → LMStudioLLM (default)
 *   LLM_PROVIDER=mock     → MockLLM (offline dev / tests)
 *
 * Usage:
 *   import { createGenerationClient } from "../providers/index.js";
 *   const client = createGenerationClient(loadConfig().llm);
 *   await client.initialize();
 */
export { MockLLM } from "./mock-llm.js";
export { LMStudioLLM, type LMStudioOptions } from "./lmstudio-llm.js";
export type { GenerationClient } from "./llm-provider.js";

import type { GenerationClient } from "./llm-provider.js";
import type { LLMConfig } from "../core/config/index.js";
import { MockLLM } from "./mock-llm.js";
import { LMStudioLLM } from "./lmstudio-llm.js";

export function createGenerationClient(config: LLMConfig): GenerationClient {
  if (config.provider === "mock") {
    return new MockLLM({ model: config.model });
  }

  return new LMStudioLLM({
    baseUrl: config.baseUrl,
    model: config.model,
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
  });
}
