import type { MemoryUsage, ModelInfo, SamplingParams } from "../core/schemas/index.js";

/**
 * GenerationClient – the seam between the orchestrator and a model server.
 *
 * `initialize()` must resolve before the first `generate()` call; the
 * resolved model and loaded flag are read-only afterwards.
 */
export interface GenerationClient {
  readonly name: string;
  readonly isLoaded: boolean;
  readonly modelName: string;

  /** Connect to the model server and resolve the model to use. */
  initialize(): Promise<void>;

  /** Run one completion and return the trimmed text. */
  generate(prompt: string, params: SamplingParams): Promise<string>;

  getModelInfo(): ModelInfo;

  getMemoryUsage(): MemoryUsage;
}
