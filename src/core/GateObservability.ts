import type { InvocationContext } from "../types/Capability.js";
import type { InvocationOutcome } from "../types/Outcome.js";
import type {
  CapabilityCalledEvent,
  CapabilityDeniedEvent,
  CapabilityResultEvent,
} from "../types/Events.js";
import type { EventLog } from "../observability/EventLog.js";
import type { Metrics } from "../observability/Metrics.js";
import { sanitizeForLog, summarizeForLog } from "../observability/Logger.js";
import type { Logger } from "../observability/Logger.js";
import { describeError, errorKindOf, type ErrorKind } from "./Errors.js";

export interface ObservabilityDependencies {
  eventLog: EventLog;
  metrics: Metrics;
  logger: Logger;
  /** Event timestamps (epoch ms) */
  clock: () => number;
}

/**
 * Kinds raised by a gate check rather than by the capability itself.
 */
const DENIAL_KINDS: ReadonlySet<ErrorKind> = new Set([
  "NOT_FOUND",
  "UNAUTHORIZED",
  "RATE_LIMITED",
  "INVALID_PARAMETERS",
]);

export function emitCapabilityCalled(
  capabilityId: string,
  parameters: Record<string, unknown>,
  ctx: InvocationContext,
  deps: ObservabilityDependencies,
): void {
  const event: CapabilityCalledEvent = {
    type: "CAPABILITY_CALLED",
    timestamp: new Date(deps.clock()).toISOString(),
    jobId: ctx.jobId,
    agentId: ctx.agentId,
    capabilityId,
    callId: ctx.callId,
    parametersSummary: sanitizeForLog(parameters),
  };
  deps.eventLog.append(event);

  if (deps.logger.isEnabled("debug")) {
    deps.logger.debug("invoke.start", {
      capability: capabilityId,
      callId: ctx.callId,
      jobId: ctx.jobId,
      parameters: deps.logger.options.includeParameters
        ? sanitizeForLog(parameters)
        : undefined,
    });
  }
}

export function recordSuccess(
  outcome: InvocationOutcome,
  ctx: InvocationContext,
  deps: ObservabilityDependencies,
): void {
  const durationMs = outcome.completedAt - outcome.startedAt;
  deps.metrics.recordInvocation(outcome.capabilityId, outcome.status, durationMs);
  appendResult(outcome, ctx, deps);

  if (deps.logger.isEnabled("debug")) {
    deps.logger.debug("invoke.ok", {
      capability: outcome.capabilityId,
      callId: outcome.callId,
      durationMs,
      output: deps.logger.options.includeOutputs
        ? summarizeForLog(outcome.output)
        : undefined,
    });
  }
}

/**
 * Convert anything thrown inside the gate into an outcome and record it.
 */
export function handleFailure(
  error: unknown,
  capabilityId: string,
  ctx: InvocationContext,
  startedAt: number,
  completedAt: number,
  deps: ObservabilityDependencies,
): InvocationOutcome {
  const kind = errorKindOf(error, "CAPABILITY_EXECUTION_FAILURE");
  const message = describeError(error);
  const outcome: InvocationOutcome = {
    capabilityId,
    callId: ctx.callId,
    status: kind === "UNAUTHORIZED" ? "unauthorized" : "failed",
    error: message,
    errorKind: kind,
    startedAt,
    completedAt,
  };

  deps.metrics.recordInvocation(capabilityId, outcome.status, completedAt - startedAt);
  if (DENIAL_KINDS.has(kind)) {
    const denied: CapabilityDeniedEvent = {
      type: "CAPABILITY_DENIED",
      timestamp: new Date(deps.clock()).toISOString(),
      jobId: ctx.jobId,
      agentId: ctx.agentId,
      capabilityId,
      callId: ctx.callId,
      kind,
      reason: message,
    };
    deps.eventLog.append(denied);
    deps.metrics.recordDenied(capabilityId, kind);
  }
  appendResult(outcome, ctx, deps);

  deps.logger.warn("invoke.error", {
    capability: capabilityId,
    callId: ctx.callId,
    jobId: ctx.jobId,
    kind,
    message,
  });
  return outcome;
}

function appendResult(
  outcome: InvocationOutcome,
  ctx: InvocationContext,
  deps: ObservabilityDependencies,
): void {
  const event: CapabilityResultEvent = {
    type: "CAPABILITY_RESULT",
    timestamp: new Date(deps.clock()).toISOString(),
    jobId: ctx.jobId,
    agentId: ctx.agentId,
    capabilityId: outcome.capabilityId,
    callId: outcome.callId,
    status: outcome.status,
    durationMs: outcome.completedAt - outcome.startedAt,
    error: outcome.error,
  };
  deps.eventLog.append(event);
}
