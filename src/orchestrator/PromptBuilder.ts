import type { AgentDefinition } from "../types/Agent.js";
import type { ChatMessage } from "../types/Backend.js";
import type { ContextMessage, Job } from "../types/Job.js";

/**
 * Messages for one job: the agent's system prompt, the recent conversation
 * (when there is any), then the instruction.
 */
export function buildPrompt(agent: AgentDefinition, job: Job): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: "system", content: agent.systemPrompt }];

  const recent = job.context.recentMessages;
  if (recent.length > 0) {
    messages.push({
      role: "user",
      content: `Recent conversation:\n${recent.map(renderContextMessage).join("\n")}`,
    });
  }

  messages.push({ role: "user", content: job.instruction });
  return messages;
}

export function renderContextMessage(message: ContextMessage): string {
  return `${message.role ?? "user"}: ${message.content ?? ""}`;
}
