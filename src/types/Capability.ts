/**
 * Categories a capability can be filed under.
 * Used by CapabilityCatalogue.list() for filtering.
 */
export type CapabilityCategory =
  | "memory_read"
  | "memory_write"
  | "task_create"
  | "search"
  | "web"
  | "code"
  | "file"
  | "email"
  | "calendar"
  | "slack"
  | "jira";

export type RiskLevel = "low" | "medium" | "high";

/**
 * Static description of a registered capability.
 * Immutable once registered.
 */
export interface CapabilityDescriptor {
  /** Unique within a catalogue */
  id: string;
  name: string;
  category: CapabilityCategory;
  description: string;

  /** JSON Schema for the parameter payload */
  inputSchema: object;

  requiresAuth: boolean;
  authScopes: string[];

  /** Max calls per rolling window; absent means unlimited */
  rateLimit?: number;
  rateWindowSeconds: number;

  riskLevel: RiskLevel;
  isActive: boolean;
  metadata: Record<string, unknown>;
}

/**
 * Context handed to a capability for a single invocation.
 */
export interface InvocationContext {
  /** Supplied by the requester; echoed back on the outcome */
  callId: string;
  jobId?: string;
  agentId?: string;
  chatId?: string;
  threadId?: string;
  /** Authenticated caller identity. Required by capabilities with requiresAuth. */
  userId?: string;
  /** Aborted when the surrounding job is cancelled or times out */
  signal?: AbortSignal;
}

/**
 * Executable side of a capability.
 * The gate only ever talks to capabilities through this interface.
 */
export interface CapabilityHandle {
  /** Structural check of the payload. Must not trigger side effects. */
  validate(parameters: Record<string, unknown>): boolean;
  execute(
    parameters: Record<string, unknown>,
    context: InvocationContext,
  ): unknown | Promise<unknown>;
}

/**
 * Descriptor shape accepted by definition helpers; defaults are filled in.
 */
export type CapabilityDescriptorInput = Pick<
  CapabilityDescriptor,
  "id" | "category" | "description" | "inputSchema"
> &
  Partial<Omit<CapabilityDescriptor, "id" | "category" | "description" | "inputSchema">>;
