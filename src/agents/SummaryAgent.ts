import type { AgentDefinition } from "../types/Agent.js";
import type { ContextMessage, Job } from "../types/Job.js";
import { createJob } from "../jobs/createJob.js";

const SUMMARY_SYSTEM_PROMPT = `You are SummaryAgent, an assistant that summarizes conversations and content.

When summarizing:
1. Open with a short overview of two or three sentences.
2. List the key discussion points.
3. List action items as "- [ ] <item>" lines, naming assignees when mentioned.
4. Note any decisions that were made.

Use clear sections.`;

/**
 * Built-in summary agent.
 */
export const SUMMARY_AGENT: AgentDefinition = {
  id: "summary_agent",
  name: "SummaryAgent",
  description: "Summarizes conversations, meetings and content",
  template: "summary",
  systemPrompt: SUMMARY_SYSTEM_PROMPT,
  config: {
    temperature: 0.3,
    maxTokens: 1500,
    topP: 1,
    timeoutSeconds: 30,
  },
  capabilities: ["summarize", "qa"],
  isActive: true,
};

export const SUMMARY_ALLOWED_CAPABILITIES = ["memory_read", "memory_write", "task_create"];

export interface SummaryJobInput {
  chatId: string;
  messageId: string;
  senderId: string;
  /** The request message; also used as the instruction */
  content: string;
  recentMessages?: ContextMessage[];
  threadId?: string;
  callerId?: string;
}

export function createSummaryJob(input: SummaryJobInput): Job {
  return createJob({
    agentId: SUMMARY_AGENT.id,
    instruction: input.content,
    context: {
      chatId: input.chatId,
      messageId: input.messageId,
      senderId: input.senderId,
      messageContent: input.content,
      threadId: input.threadId,
      callerId: input.callerId,
      recentMessages: input.recentMessages ?? [],
    },
    allowedCapabilities: SUMMARY_ALLOWED_CAPABILITIES,
    timeoutSeconds: 30,
  });
}
