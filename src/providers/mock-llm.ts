import type { GenerationClient } from "./llm-provider.js";
import type { MemoryUsage, ModelInfo, SamplingParams } from "../core/schemas/index.js";
import { NotInitializedError } from "../core/errors.js";

/**
 * MockLLM – a deterministic provider that needs no model server.
 * Used for tests and offline development (LLM_PROVIDER=mock).
 *
 * The reply is a small markdown stub built from the prompt's answer cue
 * (its last line) and the sampling parameters, so callers can tell which
 * template and policy produced it.
 */
export class MockLLM implements GenerationClient {
  readonly name = "MockLLM";
  readonly modelName: string;
  private loaded = false;

  constructor(options?: { model?: string }) {
    this.modelName = options?.model ?? "mock-model";
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  async initialize(): Promise<void> {
    this.loaded = true;
  }

  async generate(prompt: string, params: SamplingParams): Promise<string> {
    if (!this.loaded) {
      throw new NotInitializedError(this.name);
    }

    const lines = prompt.trimEnd().split("\n");
    const cue = lines[lines.length - 1] ?? "Document:";
    const heading = cue.replace(/:$/, "");
    return `# ${heading}\n\n[${this.name}] maxLength=${params.maxLength} temperature=${params.temperature}`;
  }

  getModelInfo(): ModelInfo {
    return {
      modelName: this.modelName,
      loaded: this.loaded,
      service: this.name,
      baseUrl: "mock://local",
    };
  }

  getMemoryUsage(): MemoryUsage {
    return { service: this.name, localService: true, memoryInfo: "In-process mock" };
  }
}
