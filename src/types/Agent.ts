export type AgentTemplate = "summary" | "research" | "task" | "custom";

export type AgentCapability =
  | "qa"
  | "summarize"
  | "search"
  | "create"
  | "action"
  | "code";

/**
 * Generation parameters for an agent.
 */
export interface AgentConfig {
  modelName?: string;
  /** 0..1 */
  temperature: number;
  maxTokens: number;
  /** 0..1 */
  topP: number;
  timeoutSeconds: number;
}

/**
 * An agent definition: system instruction plus generation parameters.
 */
export interface AgentDefinition {
  id: string;
  name: string;
  description?: string;
  template: AgentTemplate;
  systemPrompt: string;
  config: AgentConfig;
  capabilities: AgentCapability[];
  isActive: boolean;
}

export const DEFAULT_AGENT_CONFIG: AgentConfig = {
  temperature: 0.7,
  maxTokens: 2000,
  topP: 1,
  timeoutSeconds: 30,
};
