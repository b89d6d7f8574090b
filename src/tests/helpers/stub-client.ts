import type { GenerationClient } from "../../providers/llm-provider.js";
import type { MemoryUsage, ModelInfo, SamplingParams } from "../../core/schemas/index.js";
import { NotInitializedError } from "../../core/errors.js";

export interface StubCall {
  prompt: string;
  params: SamplingParams;
  startedAt: number;
}

export type StubBehaviour = (
  prompt: string,
  params: SamplingParams,
) => Promise<string> | string;

/**
 * In-process GenerationClient with scripted replies and a call log.
 */
export class StubClient implements GenerationClient {
  readonly name = "StubClient";
  readonly modelName = "stub-model";
  readonly calls: StubCall[] = [];
  private loaded: boolean;

  constructor(
    private readonly behaviour: StubBehaviour = (prompt) => `generated:${prompt.length}`,
    options: { loaded?: boolean } = {},
  ) {
    this.loaded = options.loaded ?? true;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  async initialize(): Promise<void> {
    this.loaded = true;
  }

  async generate(prompt: string, params: SamplingParams): Promise<string> {
    if (!this.loaded) throw new NotInitializedError(this.name);
    this.calls.push({ prompt, params, startedAt: Date.now() });
    return this.behaviour(prompt, params);
  }

  getModelInfo(): ModelInfo {
    return { modelName: this.modelName, loaded: this.loaded, service: this.name, baseUrl: "stub://" };
  }

  getMemoryUsage(): MemoryUsage {
    return { service: this.name, localService: true, memoryInfo: "stub" };
  }
}

export function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

export function delayedFailure(ms: number, error: Error): Promise<never> {
  return new Promise((_resolve, reject) => setTimeout(() => reject(error), ms));
}
