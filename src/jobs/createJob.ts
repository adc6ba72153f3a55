import { v4 as uuidv4 } from "uuid";
import type { ContextMessage, ExecutionContext, Job } from "../types/Job.js";

export interface CreateJobInput {
  id?: string;
  agentId: string;
  instruction: string;
  context: Partial<ExecutionContext> & Pick<ExecutionContext, "chatId">;
  allowedCapabilities?: string[];
  memoryScopes?: string[];
  timeoutSeconds?: number;
  maxRetries?: number;
}

export const DEFAULT_JOB_TIMEOUT_SECONDS = 30;
export const DEFAULT_MAX_RETRIES = 3;

/**
 * Build a pending job, generating an id when none is given.
 */
export function createJob(input: CreateJobInput, now: number = Date.now()): Job {
  const timeoutSeconds = input.timeoutSeconds ?? DEFAULT_JOB_TIMEOUT_SECONDS;
  if (!(timeoutSeconds > 0)) {
    throw new RangeError(`timeoutSeconds must be > 0, got ${timeoutSeconds}`);
  }

  return {
    id: input.id ?? uuidv4(),
    agentId: input.agentId,
    instruction: input.instruction,
    context: createExecutionContext(input.context),
    allowedCapabilities: [...(input.allowedCapabilities ?? [])],
    memoryScopes: [...(input.memoryScopes ?? [])],
    timeoutSeconds,
    maxRetries: input.maxRetries ?? DEFAULT_MAX_RETRIES,
    retryCount: 0,
    status: "pending",
    createdAt: now,
  };
}

export function createExecutionContext(
  input: Partial<ExecutionContext> & Pick<ExecutionContext, "chatId">,
): ExecutionContext {
  const recentMessages: ContextMessage[] = input.recentMessages ?? [];
  return {
    messageId: "",
    senderId: "",
    messageContent: "",
    threadMessages: [],
    participants: [],
    memoryRefs: [],
    metadata: {},
    ...input,
    recentMessages,
  };
}
