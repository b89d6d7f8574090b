import { describe, it, expect, vi, beforeEach } from "vitest";

// ── Mock the OpenAI SDK ────────────────────────────────────────────
const { mockList, mockCreate, constructorOptions, MockAPIError, MockAPIConnectionError } =
  vi.hoisted(() => {
    class MockAPIError extends Error {
      constructor(
        readonly status: number | undefined,
        readonly error: unknown,
        message: string,
      ) {
        super(message);
      }
    }
    class MockAPIConnectionError extends MockAPIError {
      constructor(message = "Connection error.") {
        super(undefined, undefined, message);
      }
    }
    return {
      mockList: vi.fn(),
      mockCreate: vi.fn(),
      constructorOptions: [] as unknown[],
      MockAPIError,
      MockAPIConnectionError,
    };
  });

vi.mock("openai", () => {
  return {
    default: class MockOpenAI {
      static APIError = MockAPIError;
      static APIConnectionError = MockAPIConnectionError;
      models = { list: mockList };
      chat = { completions: { create: mockCreate } };
      constructor(options: unknown) {
        constructorOptions.push(options);
      }
    },
  };
});

import { LMStudioLLM } from "../../providers/lmstudio-llm.js";
import {
  ConnectivityError,
  GenerationEndpointError,
  NoModelError,
  NotInitializedError,
} from "../../core/errors.js";

function modelsPage(...ids: string[]) {
  return { data: ids.map((id) => ({ id, object: "model" })) };
}

function completion(content: string | null) {
  return { choices: [{ index: 0, message: { role: "assistant", content } }] };
}

async function readyClient(model = "local-model"): Promise<LMStudioLLM> {
  mockList.mockResolvedValueOnce(modelsPage(model));
  const client = new LMStudioLLM({ model });
  await client.initialize();
  return client;
}

describe("LMStudioLLM", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    constructorOptions.length = 0;
  });

  it("should point the SDK at the /v1 API without retries", () => {
    new LMStudioLLM({ baseUrl: "http://gpu-box:1234/", timeoutMs: 5000 });

    expect(constructorOptions[0]).toEqual({
      baseURL: "http://gpu-box:1234/v1",
      apiKey: "lm-studio",
      timeout: 5000,
      maxRetries: 0,
    });
  });

  it("should report state before initialization", () => {
    const client = new LMStudioLLM();

    expect(client.isLoaded).toBe(false);
    expect(client.getModelInfo()).toEqual({
      modelName: "local-model",
      loaded: false,
      service: "LM Studio",
      baseUrl: "http://localhost:1234",
    });
  });

  // ── initialize ────────────────────────────────────────────────────

  it("should keep the configured model when the server has it", async () => {
    mockList.mockResolvedValueOnce(modelsPage("mistral-7b", "llama-3-8b"));
    const client = new LMStudioLLM({ model: "llama-3-8b" });

    await client.initialize();

    expect(client.isLoaded).toBe(true);
    expect(client.modelName).toBe("llama-3-8b");
  });

  it("should fall back to the first available model", async () => {
    mockList.mockResolvedValueOnce(modelsPage("mistral-7b", "llama-3-8b"));
    const client = new LMStudioLLM({ model: "local-model" });

    await client.initialize();

    expect(client.modelName).toBe("mistral-7b");
    expect(client.getModelInfo().loaded).toBe(true);
  });

  it("should fail with NoModelError when no model is loaded", async () => {
    mockList.mockResolvedValueOnce(modelsPage());
    const client = new LMStudioLLM();

    await expect(client.initialize()).rejects.toThrow(NoModelError);
    expect(client.isLoaded).toBe(false);
  });

  it("should fail with ConnectivityError when the server is unreachable", async () => {
    mockList.mockRejectedValueOnce(new MockAPIConnectionError());
    const client = new LMStudioLLM({ baseUrl: "http://localhost:9999" });

    await expect(client.initialize()).rejects.toThrow(
      "Cannot connect to model server at http://localhost:9999: Connection error.",
    );
    expect(client.isLoaded).toBe(false);
  });

  it("should fail with ConnectivityError on a non-success listing", async () => {
    mockList.mockRejectedValueOnce(new MockAPIError(502, undefined, "Bad gateway"));
    const client = new LMStudioLLM();

    await expect(client.initialize()).rejects.toBeInstanceOf(ConnectivityError);
  });

  it("should only list models once", async () => {
    const client = await readyClient();
    await client.initialize();

    expect(mockList).toHaveBeenCalledOnce();
  });

  // ── generate ──────────────────────────────────────────────────────

  it("should refuse to generate before initialization", async () => {
    const client = new LMStudioLLM();

    await expect(
      client.generate("Write a README", { maxLength: 2000, temperature: 0.5 }),
    ).rejects.toBeInstanceOf(NotInitializedError);
    expect(mockCreate).not.toHaveBeenCalled();
  });

  it("should send a single chat completion and trim the reply", async () => {
    const client = await readyClient("qwen-14b");
    mockCreate.mockResolvedValueOnce(completion("\n  # Project\n\nHello  \n"));

    const text = await client.generate("Write a README", { maxLength: 2000, temperature: 0.5 });

    expect(text).toBe("# Project\n\nHello");
    expect(mockCreate).toHaveBeenCalledOnce();
    expect(mockCreate).toHaveBeenCalledWith({
      model: "qwen-14b",
      messages: [{ role: "user", content: "Write a README" }],
      max_tokens: 2000,
      temperature: 0.5,
      stream: false,
    });
  });

  it("should wrap a non-success response in GenerationEndpointError", async () => {
    const client = await readyClient();
    mockCreate.mockRejectedValueOnce(
      new MockAPIError(500, { message: "context length exceeded" }, "500 context length exceeded"),
    );

    const failure = client.generate("prompt", { maxLength: 3000, temperature: 0.3 });

    await expect(failure).rejects.toBeInstanceOf(GenerationEndpointError);
    await expect(failure).rejects.toMatchObject({
      status: 500,
      body: '{"message":"context length exceeded"}',
    });
  });

  it("should fall back to the SDK message when the error has no body", async () => {
    const client = await readyClient();
    mockCreate.mockRejectedValueOnce(new MockAPIError(503, undefined, "503 status code (no body)"));

    await expect(client.generate("prompt", { maxLength: 10, temperature: 0 })).rejects.toMatchObject({
      status: 503,
      body: "503 status code (no body)",
    });
  });

  it("should reject a completion without message content", async () => {
    const client = await readyClient();
    mockCreate.mockResolvedValueOnce(completion(null));

    await expect(client.generate("prompt", { maxLength: 10, temperature: 0 })).rejects.toThrow(
      "Model server API error: 200 completion contained no message content",
    );
  });

  it("should propagate connection failures during generation", async () => {
    const client = await readyClient();
    mockCreate.mockRejectedValueOnce(new MockAPIConnectionError("Request timed out."));

    const failure = client.generate("prompt", { maxLength: 10, temperature: 0 });

    await expect(failure).rejects.toThrow("Request timed out.");
    await expect(failure).rejects.not.toBeInstanceOf(GenerationEndpointError);
  });

  it("should describe memory as managed by the model server", () => {
    expect(new LMStudioLLM().getMemoryUsage()).toEqual({
      service: "LM Studio",
      localService: true,
      memoryInfo: "Managed by LM Studio",
    });
  });
});
