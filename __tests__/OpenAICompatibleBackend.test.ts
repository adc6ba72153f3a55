import { describe, it, expect, vi } from "vitest";
import {
  OpenAICompatibleBackend,
  createOpenAICompatibleBackend,
  parseCompletion,
} from "../src/llm/OpenAICompatibleBackend.js";
import { RuntimeError } from "../src/core/Errors.js";
import { calculatorCapability } from "./fixtures/index.js";

function mockFetch(body: unknown, init: { ok?: boolean; status?: number } = {}) {
  return vi.fn().mockResolvedValue({
    ok: init.ok ?? true,
    status: init.status ?? 200,
    json: vi.fn().mockResolvedValue(body),
  });
}

const baseRequest = {
  messages: [
    { role: "system" as const, content: "Be brief." },
    { role: "user" as const, content: "Hello" },
  ],
  temperature: 0.3,
  maxTokens: 100,
};

describe("OpenAICompatibleBackend", () => {
  it("is created by the factory", () => {
    const backend = createOpenAICompatibleBackend("https://llm.example.com/v1", "test-model");
    expect(backend).toBeInstanceOf(OpenAICompatibleBackend);
  });

  it("posts messages, parameters and tools to /chat/completions", async () => {
    const fetch = mockFetch({ choices: [{ message: { content: "Hi." } }] });
    const backend = new OpenAICompatibleBackend({
      baseUrl: "https://llm.example.com/v1/",
      model: "test-model",
      apiKey: "test-secret",
      fetch,
    });

    await backend.generate({
      ...baseRequest,
      topP: 0.9,
      capabilities: [calculatorCapability.descriptor],
    });

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe("https://llm.example.com/v1/chat/completions");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(init.body)).toEqual({
      model: "test-model",
      messages: baseRequest.messages,
      temperature: 0.3,
      max_tokens: 100,
      top_p: 0.9,
      tools: [
        {
          type: "function",
          function: {
            name: "calculator",
            description: "Adds two numbers",
            parameters: calculatorCapability.descriptor.inputSchema,
          },
        },
      ],
    });
  });

  it("omits tools and auth when there are none", async () => {
    const fetch = mockFetch({ choices: [{ message: { content: "x" } }] });
    const backend = new OpenAICompatibleBackend({ baseUrl: "http://localhost:1", model: "m", fetch });

    await backend.generate({ ...baseRequest, model: "override" });

    const init = fetch.mock.calls[0]?.[1];
    const body = JSON.parse(init.body);
    expect(body.tools).toBeUndefined();
    expect(body.model).toBe("override");
    expect(init.headers.Authorization).toBeUndefined();
  });

  it("maps content, tool calls and usage", async () => {
    const fetch = mockFetch({
      model: "test-model",
      choices: [
        {
          finish_reason: "tool_calls",
          message: {
            content: null,
            tool_calls: [
              { id: "call_a", type: "function", function: { name: "calculator", arguments: '{"a":1,"b":2}' } },
              { id: "call_b", type: "function", function: { name: "calculator", arguments: "not json" } },
            ],
          },
        },
      ],
      usage: { prompt_tokens: 12, completion_tokens: 3 },
    });
    const backend = new OpenAICompatibleBackend({ baseUrl: "http://localhost:1", model: "m", fetch });

    const response = await backend.generate(baseRequest);

    expect(response).toEqual({
      content: "",
      toolCalls: [
        { id: "call_a", capabilityId: "calculator", parameters: { a: 1, b: 2 } },
        { id: "call_b", capabilityId: "calculator", parameters: {} },
      ],
      usage: { inputTokens: 12, outputTokens: 3 },
      model: "test-model",
      stopReason: "tool_calls",
    });
  });

  it("raises a backend failure on a non-OK response", async () => {
    const fetch = mockFetch({ error: { message: "bad key" } }, { ok: false, status: 401 });
    const backend = new OpenAICompatibleBackend({ baseUrl: "http://localhost:1", model: "m", fetch });

    const error = await backend.generate(baseRequest).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RuntimeError);
    expect(error instanceof RuntimeError ? error.kind : undefined).toBe("BACKEND_FAILURE");
    expect(error instanceof Error ? error.message : "").toBe('LLM API error 401: {"message":"bad key"}');
  });

  it("raises a backend failure when the transport fails", async () => {
    const fetch = vi.fn().mockRejectedValue(new Error("connection refused"));
    const backend = new OpenAICompatibleBackend({ baseUrl: "http://localhost:1", model: "m", fetch });

    await expect(backend.generate(baseRequest)).rejects.toThrow("LLM request failed: connection refused");
  });

  it("forwards the caller's abort signal", async () => {
    const fetch = mockFetch({ choices: [] });
    const backend = new OpenAICompatibleBackend({ baseUrl: "http://localhost:1", model: "m", fetch });
    const controller = new AbortController();

    await backend.generate(baseRequest, { signal: controller.signal });
    const signal: AbortSignal = fetch.mock.calls[0]?.[1].signal;
    expect(signal.aborted).toBe(false);

    controller.abort();
    expect(signal.aborted).toBe(true);
  });
});

describe("parseCompletion", () => {
  it("falls back to empty values for an unexpected body", () => {
    expect(parseCompletion("nonsense")).toEqual({
      content: "",
      toolCalls: [],
      usage: { inputTokens: 0, outputTokens: 0 },
      model: undefined,
      stopReason: undefined,
    });
  });

  it("skips tool calls without a function name and numbers missing ids", () => {
    const response = parseCompletion({
      choices: [
        {
          message: {
            content: "ok",
            tool_calls: [{ function: { arguments: "{}" } }, { function: { name: "search", arguments: '{"q":"x"}' } }],
          },
        },
      ],
    });
    expect(response.toolCalls).toEqual([{ id: "call_1", capabilityId: "search", parameters: { q: "x" } }]);
  });
});
