import type {
  CapabilityDescriptor,
  CapabilityHandle,
  InvocationContext,
} from "../types/Capability.js";
import type { CapabilityCatalogue } from "../registry/CapabilityCatalogue.js";
import type { Logger } from "../observability/Logger.js";
import { RateWindow } from "./RateWindow.js";
import { createTaggedError, describeError } from "./Errors.js";

export interface ResolvedCapability {
  descriptor: CapabilityDescriptor;
  handle: CapabilityHandle;
}

/**
 * Gate step 1: the id must resolve in the catalogue.
 */
export function resolveCapability(
  capabilityId: string,
  catalogue: Pick<CapabilityCatalogue, "describe" | "lookup">,
): ResolvedCapability {
  const descriptor = catalogue.describe(capabilityId);
  const handle = catalogue.lookup(capabilityId);
  if (!descriptor || !handle) {
    throw createTaggedError("NOT_FOUND", `Capability not found: ${capabilityId}`);
  }
  return { descriptor, handle };
}

/**
 * Gate step 2: capabilities marked requiresAuth need a caller identity.
 */
export function authorize(
  descriptor: CapabilityDescriptor,
  ctx: InvocationContext,
): void {
  if (descriptor.requiresAuth && !ctx.userId) {
    throw createTaggedError(
      "UNAUTHORIZED",
      `Permission denied: capability ${descriptor.id} requires an authenticated caller`,
    );
  }
}

/**
 * Gate step 3: consult the rate window when the descriptor declares a limit.
 */
export function enforceRateLimit(
  descriptor: CapabilityDescriptor,
  rateWindow: RateWindow,
): void {
  if (!rateWindow.allow(descriptor.id, descriptor.rateLimit, descriptor.rateWindowSeconds)) {
    throw createTaggedError(
      "RATE_LIMITED",
      `Rate limit exceeded for capability: ${descriptor.id}`,
      { limit: descriptor.rateLimit, windowSeconds: descriptor.rateWindowSeconds },
    );
  }
}

/**
 * Gate step 4: the handle's own structural check. A throwing validator counts as a rejection.
 */
export function validateParameters(
  descriptor: CapabilityDescriptor,
  handle: CapabilityHandle,
  parameters: Record<string, unknown>,
): void {
  let valid: boolean;
  try {
    valid = handle.validate(parameters);
  } catch (error) {
    throw createTaggedError(
      "INVALID_PARAMETERS",
      `Invalid parameters for capability: ${descriptor.id} (${describeError(error)})`,
    );
  }
  if (!valid) {
    throw createTaggedError(
      "INVALID_PARAMETERS",
      `Invalid parameters for capability: ${descriptor.id}`,
    );
  }
}

/**
 * Gate step 5: invoke the handle. Anything it throws is re-tagged as an execution failure.
 */
export async function dispatch(
  descriptor: CapabilityDescriptor,
  handle: CapabilityHandle,
  parameters: Record<string, unknown>,
  ctx: InvocationContext,
  logger: Logger,
): Promise<unknown> {
  if (ctx.signal?.aborted) {
    throw createTaggedError(
      "CANCELLED",
      `Invocation of ${descriptor.id} aborted before dispatch`,
    );
  }

  logger.trace("dispatch.start", {
    capability: descriptor.id,
    callId: ctx.callId,
    jobId: ctx.jobId,
  });
  try {
    const output = await handle.execute(parameters, ctx);
    logger.trace("dispatch.end", { capability: descriptor.id, callId: ctx.callId });
    return output;
  } catch (error) {
    throw createTaggedError("CAPABILITY_EXECUTION_FAILURE", describeError(error), {
      errorName: error instanceof Error ? error.name : typeof error,
    });
  }
}
