import type { InvocationOutcome } from "./Outcome.js";

/**
 * Job status. pending and running are transient; the rest are terminal.
 */
export type JobStatus =
  | "pending"
  | "running"
  | "completed"
  | "failed"
  | "cancelled";

export type TerminalJobStatus = Extract<JobStatus, "completed" | "failed" | "cancelled">;

/**
 * A message from the conversation a job was raised in.
 */
export interface ContextMessage {
  role?: string;
  content?: string;
  [key: string]: unknown;
}

/**
 * Conversation context a job executes against.
 */
export interface ExecutionContext {
  chatId: string;
  messageId: string;
  senderId: string;
  messageContent: string;
  threadId?: string;
  /** Authenticated caller; forwarded to capabilities that require auth */
  callerId?: string;
  recentMessages: ContextMessage[];
  threadMessages: ContextMessage[];
  participants: Record<string, unknown>[];
  memoryRefs: string[];
  metadata: Record<string, unknown>;
}

/**
 * One request to an agent to perform an instruction.
 */
export interface Job {
  id: string;
  agentId: string;
  instruction: string;
  context: ExecutionContext;

  /** Capability ids the job may invoke */
  allowedCapabilities: string[];
  memoryScopes: string[];
  timeoutSeconds: number;

  /** Carried for the submission layer; not driven by the orchestrator */
  maxRetries: number;
  retryCount: number;

  status: JobStatus;
  createdAt: number; // epoch ms
  startedAt?: number;
  completedAt?: number;
}

/**
 * A follow-up item derived from the response text.
 */
export interface ActionItem {
  description: string;
  assignee?: string;
  priority: "low" | "medium" | "high" | "urgent";
  dueDate?: number;
}

/**
 * Terminal result of a job. Produced exactly once per submission.
 */
export interface JobOutcome {
  jobId: string;
  agentId: string;
  status: TerminalJobStatus;
  response: string;
  actionItems: ActionItem[];
  capabilityOutcomes: InvocationOutcome[];
  inputTokens: number;
  outputTokens: number;
  /** Present only when status is failed */
  error?: string;
  startedAt?: number;
  completedAt?: number;
  /** The job as it stood when the outcome was produced */
  job: Job;
}
