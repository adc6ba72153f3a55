/**
 * TextGenerationBackend over an OpenAI-compatible /chat/completions endpoint.
 * Use createOpenAICompatibleBackend(baseUrl, model, apiKey?).
 */

import type {
  GenerationRequest,
  GenerationResponse,
  RequestedCall,
  TextGenerationBackend,
} from "../types/Backend.js";
import type { CapabilityDescriptor } from "../types/Capability.js";
import { createTaggedError, describeError } from "../core/Errors.js";

export interface OpenAIToolDefinition {
  type: "function";
  function: {
    name: string;
    description?: string;
    parameters?: object;
  };
}

export interface OpenAICompatibleBackendConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  /** Per-request timeout in milliseconds. Default 60000. */
  requestTimeoutMs?: number;
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 60_000;

export function createOpenAICompatibleBackend(
  baseUrl: string,
  model: string,
  apiKey?: string,
): OpenAICompatibleBackend {
  return new OpenAICompatibleBackend({ baseUrl, model, apiKey });
}

export class OpenAICompatibleBackend implements TextGenerationBackend {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly apiKey?: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: OpenAICompatibleBackendConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model;
    this.apiKey = config.apiKey;
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async generate(
    request: GenerationRequest,
    options: { signal?: AbortSignal } = {},
  ): Promise<GenerationResponse> {
    const body: Record<string, unknown> = {
      model: request.model ?? this.model,
      messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    };
    if (request.topP !== undefined) body.top_p = request.topP;
    if (request.capabilities?.length) body.tools = request.capabilities.map(toToolDefinition);

    const raw = await this.request(body, options.signal);
    return parseCompletion(raw);
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) headers["Authorization"] = `Bearer ${this.apiKey}`;
    return headers;
  }

  private async request(body: object, signal?: AbortSignal): Promise<unknown> {
    const url = `${this.baseUrl}/chat/completions`;
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(body),
        signal: combined,
      });
    } catch (err) {
      if (timeout.aborted && !signal?.aborted) {
        throw createTaggedError(
          "BACKEND_FAILURE",
          `LLM request timed out after ${this.requestTimeoutMs}ms`,
        );
      }
      throw createTaggedError("BACKEND_FAILURE", `LLM request failed: ${describeError(err)}`, err);
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (err) {
      throw createTaggedError(
        "BACKEND_FAILURE",
        `LLM API returned invalid JSON (status ${response.status})`,
        err,
      );
    }

    if (!response.ok) {
      const errBody = isRecord(raw) && "error" in raw ? raw.error : raw;
      throw createTaggedError(
        "BACKEND_FAILURE",
        `LLM API error ${response.status}: ${JSON.stringify(errBody)}`,
      );
    }
    return raw;
  }
}

export function toToolDefinition(descriptor: CapabilityDescriptor): OpenAIToolDefinition {
  return {
    type: "function",
    function: {
      name: descriptor.id,
      description: descriptor.description,
      parameters: descriptor.inputSchema,
    },
  };
}

/**
 * Map a chat completion body to a GenerationResponse. Missing fields become
 * empty content, no calls and zero usage.
 */
export function parseCompletion(raw: unknown): GenerationResponse {
  const choices: unknown[] = isRecord(raw) && Array.isArray(raw.choices) ? raw.choices : [];
  const choice = choices[0];
  const message: Record<string, unknown> =
    isRecord(choice) && isRecord(choice.message) ? choice.message : {};
  const usage: Record<string, unknown> = isRecord(raw) && isRecord(raw.usage) ? raw.usage : {};

  const toolCalls: RequestedCall[] = Array.isArray(message.tool_calls)
    ? message.tool_calls.filter(isRecord).flatMap((tc, index) => parseToolCall(tc, index))
    : [];

  return {
    content: typeof message.content === "string" ? message.content : "",
    toolCalls,
    usage: {
      inputTokens: typeof usage.prompt_tokens === "number" ? usage.prompt_tokens : 0,
      outputTokens: typeof usage.completion_tokens === "number" ? usage.completion_tokens : 0,
    },
    model: isRecord(raw) && typeof raw.model === "string" ? raw.model : undefined,
    stopReason:
      isRecord(choice) && typeof choice.finish_reason === "string"
        ? choice.finish_reason
        : undefined,
  };
}

function parseToolCall(tc: Record<string, unknown>, index: number): RequestedCall[] {
  const fn: Record<string, unknown> = isRecord(tc.function) ? tc.function : {};
  if (typeof fn.name !== "string" || !fn.name) return [];
  return [
    {
      id: typeof tc.id === "string" ? tc.id : `call_${index}`,
      capabilityId: fn.name,
      parameters: parseArgs(fn.arguments),
    },
  ];
}

function parseArgs(json: unknown): Record<string, unknown> {
  if (typeof json !== "string" || !json) return {};
  try {
    const parsed: unknown = JSON.parse(json);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
