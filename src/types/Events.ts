import type { ErrorKind } from "../core/Errors.js";
import type { InvocationStatus } from "./Outcome.js";
import type { JobStatus } from "./Job.js";

/**
 * Event types emitted by the gate and the orchestrator.
 */
export type RuntimeEventType =
  | "JOB_SUBMITTED"
  | "JOB_STARTED"
  | "JOB_COMPLETED"
  | "JOB_FAILED"
  | "JOB_CANCELLED"
  | "CAPABILITY_CALLED"
  | "CAPABILITY_RESULT"
  | "CAPABILITY_DENIED";

/**
 * Base event structure.
 */
export interface RuntimeEvent {
  type: RuntimeEventType;
  timestamp: string; // ISO 8601
  jobId?: string;
  agentId?: string;
}

export interface JobSubmittedEvent extends RuntimeEvent {
  type: "JOB_SUBMITTED";
  jobId: string;
  agentId: string;
}

export interface JobStartedEvent extends RuntimeEvent {
  type: "JOB_STARTED";
  jobId: string;
  agentId: string;
}

export interface JobCompletedEvent extends RuntimeEvent {
  type: "JOB_COMPLETED";
  jobId: string;
  durationMs: number;
  actionItemCount: number;
}

export interface JobFailedEvent extends RuntimeEvent {
  type: "JOB_FAILED";
  jobId: string;
  error: string;
  /** Status the job was in when it failed; pending when it never started */
  fromStatus: JobStatus;
}

export interface JobCancelledEvent extends RuntimeEvent {
  type: "JOB_CANCELLED";
  jobId: string;
}

export interface CapabilityCalledEvent extends RuntimeEvent {
  type: "CAPABILITY_CALLED";
  capabilityId: string;
  callId: string;
  /** Sanitized summary of parameters */
  parametersSummary: string;
}

export interface CapabilityResultEvent extends RuntimeEvent {
  type: "CAPABILITY_RESULT";
  capabilityId: string;
  callId: string;
  status: InvocationStatus;
  durationMs: number;
  error?: string;
}

/**
 * Emitted when a gate check (auth, rate, params, existence) stops a call.
 */
export interface CapabilityDeniedEvent extends RuntimeEvent {
  type: "CAPABILITY_DENIED";
  capabilityId: string;
  callId: string;
  kind: ErrorKind;
  reason: string;
}

export type AnyRuntimeEvent =
  | JobSubmittedEvent
  | JobStartedEvent
  | JobCompletedEvent
  | JobFailedEvent
  | JobCancelledEvent
  | CapabilityCalledEvent
  | CapabilityResultEvent
  | CapabilityDeniedEvent;
