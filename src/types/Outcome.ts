import type { ErrorKind } from "../core/Errors.js";

/**
 * Terminal status of a single capability invocation.
 */
export type InvocationStatus = "completed" | "failed" | "unauthorized";

/**
 * Result of one invocation attempt through the InvocationGate.
 * Always produced, never thrown. Never mutated after creation.
 */
export interface InvocationOutcome {
  capabilityId: string;
  callId: string;
  status: InvocationStatus;
  /** Opaque payload returned by the capability */
  output?: unknown;
  error?: string;
  errorKind?: ErrorKind;
  startedAt: number; // epoch ms
  completedAt: number;
}
