import type { CapabilityDescriptor } from "./Capability.js";

export type MessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * A capability call requested by the backend.
 */
export interface RequestedCall {
  id: string;
  capabilityId: string;
  parameters: Record<string, unknown>;
}

export interface GenerationRequest {
  messages: ChatMessage[];
  /** Omitted when the job may not invoke any capability */
  capabilities?: CapabilityDescriptor[];
  temperature: number;
  maxTokens: number;
  topP?: number;
  model?: string;
}

export interface GenerationResponse {
  content: string;
  toolCalls: RequestedCall[];
  usage: { inputTokens: number; outputTokens: number };
  model?: string;
  stopReason?: string;
}

/**
 * Text-generation backend. Implementations surface provider errors by rejecting.
 */
export interface TextGenerationBackend {
  generate(
    request: GenerationRequest,
    options?: { signal?: AbortSignal },
  ): Promise<GenerationResponse>;
}
