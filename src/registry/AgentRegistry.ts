import type { AgentDefinition } from "../types/Agent.js";
import { InvalidAgentDefinitionError } from "../core/Errors.js";
import { SchemaValidator, formatValidationErrors } from "../core/SchemaValidator.js";

/**
 * Lookup contract the orchestrator needs from an agent store.
 */
export interface AgentRegistry {
  get(agentId: string): AgentDefinition | undefined;
}

export const agentDefinitionSchema = {
  type: "object",
  properties: {
    id: { type: "string", minLength: 1 },
    name: { type: "string", minLength: 1, maxLength: 128 },
    description: { type: "string", maxLength: 1000 },
    template: { type: "string", enum: ["summary", "research", "task", "custom"] },
    systemPrompt: { type: "string", minLength: 1 },
    config: {
      type: "object",
      properties: {
        modelName: { type: "string" },
        temperature: { type: "number", minimum: 0, maximum: 1 },
        maxTokens: { type: "integer", exclusiveMinimum: 0 },
        topP: { type: "number", minimum: 0, maximum: 1 },
        timeoutSeconds: { type: "number", exclusiveMinimum: 0 },
      },
      required: ["temperature", "maxTokens", "topP", "timeoutSeconds"],
    },
    capabilities: {
      type: "array",
      items: {
        type: "string",
        enum: ["qa", "summarize", "search", "create", "action", "code"],
      },
    },
    isActive: { type: "boolean" },
  },
  required: ["id", "name", "template", "systemPrompt", "config", "capabilities", "isActive"],
} as const;

/**
 * In-memory agent registry. Definitions are schema-checked on registration.
 */
export class InMemoryAgentRegistry implements AgentRegistry {
  private readonly agents = new Map<string, AgentDefinition>();

  constructor(private readonly validator: SchemaValidator = new SchemaValidator()) {}

  /**
   * Register (or replace) an agent definition.
   */
  register(agent: AgentDefinition): void {
    const result = this.validator.validate(agentDefinitionSchema, agent);
    if (!result.valid) {
      const errors = formatValidationErrors(result.errors ?? []);
      throw new InvalidAgentDefinitionError(
        `Invalid agent definition ${agent.id || "(no id)"}: ${errors.join("; ")}`,
        errors,
      );
    }
    this.agents.set(agent.id, agent);
  }

  get(agentId: string): AgentDefinition | undefined {
    return this.agents.get(agentId);
  }

  list(): AgentDefinition[] {
    return [...this.agents.values()];
  }

  unregister(agentId: string): boolean {
    return this.agents.delete(agentId);
  }

  get size(): number {
    return this.agents.size;
  }
}
