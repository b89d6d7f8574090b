import OpenAI from "openai";
import type { GenerationClient } from "./llm-provider.js";
import {
  charLength,
  type MemoryUsage,
  type ModelInfo,
  type SamplingParams,
} from "../core/schemas/index.js";
import {
  ConnectivityError,
  GenerationEndpointError,
  NoModelError,
  NotInitializedError,
  errorMessage,
} from "../core/errors.js";
import { createLogger } from "../core/logger.js";

const logger = createLogger("lmstudio-llm");

const SERVICE_NAME = "LM Studio";

export interface LMStudioOptions {
  baseUrl?: string;
  model?: string;
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * LM Studio provider – talks to the OpenAI-compatible API a local
 * LM Studio (or llama.cpp, vLLM, Ollama) server exposes under /v1.
 *
 * The configured model is only a preference: `initialize()` falls back to
 * the first model the server reports when the preferred id is absent.
 */
export class LMStudioLLM implements GenerationClient {
  readonly name = SERVICE_NAME;
  readonly baseUrl: string;
  private readonly client: OpenAI;
  private model: string;
  private loaded = false;

  constructor(options: LMStudioOptions = {}) {
    this.baseUrl = (options.baseUrl ?? "http://localhost:1234").replace(/\/+$/, "");
    this.model = options.model ?? "local-model";
    this.client = new OpenAI({
      baseURL: `${this.baseUrl}/v1`,
      apiKey: options.apiKey ?? "lm-studio",
      timeout: options.timeoutMs ?? 300_000,
      maxRetries: 0,
    });
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  get modelName(): string {
    return this.model;
  }

  async initialize(): Promise<void> {
    if (this.loaded) return;

    logger.info({ baseUrl: this.baseUrl }, "Initializing model server connection");

    let available: string[];
    try {
      const page = await this.client.models.list();
      available = page.data.map((model) => model.id);
    } catch (error) {
      if (error instanceof OpenAI.APIConnectionError) {
        logger.error({ baseUrl: this.baseUrl }, "Cannot reach model server");
        throw new ConnectivityError(this.baseUrl, error.message);
      }
      if (error instanceof OpenAI.APIError) {
        logger.error({ baseUrl: this.baseUrl, status: error.status }, "Model listing failed");
        throw new ConnectivityError(this.baseUrl, `status ${error.status ?? "unknown"}`);
      }
      throw error;
    }

    const first = available[0];
    if (first === undefined) {
      logger.error({ baseUrl: this.baseUrl }, "No models loaded on model server");
      throw new NoModelError(this.baseUrl);
    }

    if (!available.includes(this.model)) {
      logger.info({ requested: this.model, using: first }, "Using available model");
      this.model = first;
    }

    this.loaded = true;
    logger.info({ model: this.model, availableModels: available }, "Model server connection established");
  }

  async generate(prompt: string, params: SamplingParams): Promise<string> {
    if (!this.loaded) {
      throw new NotInitializedError(SERVICE_NAME);
    }

    const startedAt = Date.now();

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: params.maxLength,
        temperature: params.temperature,
        stream: false,
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      if (error instanceof OpenAI.APIError && error.status !== undefined) {
        const body = error.error === undefined ? error.message : JSON.stringify(error.error);
        logger.error({ status: error.status, body }, "Model server rejected completion");
        throw new GenerationEndpointError(error.status, body);
      }
      logger.error({ error: errorMessage(error) }, "Completion request failed");
      throw error;
    }

    if (content === null || content === undefined) {
      throw new GenerationEndpointError(200, "completion contained no message content");
    }

    const text = content.trim();
    logger.info(
      { generationTime: (Date.now() - startedAt) / 1000, outputLength: charLength(text) },
      "Completion received",
    );
    return text;
  }

  getModelInfo(): ModelInfo {
    return {
      modelName: this.model,
      loaded: this.loaded,
      service: SERVICE_NAME,
      baseUrl: this.baseUrl,
    };
  }

  /** The model server manages its own memory; nothing to measure here. */
  getMemoryUsage(): MemoryUsage {
    return {
      service: SERVICE_NAME,
      localService: true,
      memoryInfo: `Managed by ${SERVICE_NAME}`,
    };
  }
}
