import type { CapabilityDescriptor, InvocationContext } from "../types/Capability.js";
import type { InvocationOutcome } from "../types/Outcome.js";
import { CapabilityCatalogue } from "../registry/CapabilityCatalogue.js";
import { EventLog } from "../observability/EventLog.js";
import { Metrics } from "../observability/Metrics.js";
import { createLogger } from "../observability/Logger.js";
import type { DebugOptions, Logger } from "../observability/Logger.js";
import { RateWindow } from "./RateWindow.js";
import {
  resolveCapability,
  authorize,
  enforceRateLimit,
  validateParameters,
  dispatch,
} from "./GatePipeline.js";
import {
  emitCapabilityCalled,
  recordSuccess,
  handleFailure,
  type ObservabilityDependencies,
} from "./GateObservability.js";

export interface InvocationGateConfig {
  debug?: DebugOptions;
  /** Time source for outcome timestamps and the rate window (epoch ms) */
  clock?: () => number;
}

/**
 * One entry of a batch invocation.
 */
export interface BatchCall {
  capabilityId: string;
  parameters: Record<string, unknown>;
  /** Overrides the shared context's callId for this entry */
  callId?: string;
}

/**
 * Invocation Gate: the only path from a capability call to its handle.
 *
 * Ordered checks, first failure wins:
 * 1. Existence (catalogue lookup)
 * 2. Authorization (requiresAuth needs ctx.userId)
 * 3. Rate limit (private RateWindow)
 * 4. Parameter validation (handle.validate)
 * 5. Dispatch (handle.execute)
 *
 * Never throws to callers - always returns an InvocationOutcome.
 */
export class InvocationGate {
  private readonly catalogue: CapabilityCatalogue;
  private readonly rateWindow: RateWindow;
  private readonly eventLog: EventLog;
  private readonly metrics: Metrics;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(
    options: {
      catalogue?: CapabilityCatalogue;
      eventLog?: EventLog;
      metrics?: Metrics;
      config?: InvocationGateConfig;
    } = {},
  ) {
    const config = options.config ?? {};
    this.clock = config.clock ?? Date.now;
    this.catalogue = options.catalogue ?? new CapabilityCatalogue();
    this.rateWindow = new RateWindow({ clock: this.clock });
    this.eventLog = options.eventLog ?? new EventLog();
    this.metrics = options.metrics ?? new Metrics();
    this.logger = createLogger({ ...config.debug, prefix: "InvocationGate" });
  }

  getCatalogue(): CapabilityCatalogue {
    return this.catalogue;
  }

  getEventLog(): EventLog {
    return this.eventLog;
  }

  getMetrics(): Metrics {
    return this.metrics;
  }

  /**
   * Invoke one capability through the ordered checks.
   */
  async execute(
    capabilityId: string,
    parameters: Record<string, unknown>,
    ctx: InvocationContext,
  ): Promise<InvocationOutcome> {
    const startedAt = this.clock();
    const deps = this.getObservabilityDeps();

    try {
      emitCapabilityCalled(capabilityId, parameters, ctx, deps);

      const { descriptor, handle } = resolveCapability(capabilityId, this.catalogue);
      authorize(descriptor, ctx);
      enforceRateLimit(descriptor, this.rateWindow);
      validateParameters(descriptor, handle, parameters);

      const output = await dispatch(descriptor, handle, parameters, ctx, this.logger);

      const outcome: InvocationOutcome = {
        capabilityId,
        callId: ctx.callId,
        status: "completed",
        output,
        startedAt,
        completedAt: this.clock(),
      };
      recordSuccess(outcome, ctx, deps);
      return outcome;
    } catch (error) {
      return handleFailure(error, capabilityId, ctx, startedAt, this.clock(), deps);
    }
  }

  /**
   * Invoke several capabilities concurrently with a shared context.
   * Outcomes come back in input order; attempts do not affect one another.
   */
  async executeBatch(
    calls: BatchCall[],
    ctx: InvocationContext,
  ): Promise<InvocationOutcome[]> {
    return Promise.all(
      calls.map((call) =>
        this.execute(call.capabilityId, call.parameters, {
          ...ctx,
          callId: call.callId ?? ctx.callId,
        }),
      ),
    );
  }

  /**
   * Descriptors for the given ids, silently skipping ids that do not resolve.
   */
  resolveDescriptors(capabilityIds: readonly string[]): CapabilityDescriptor[] {
    return capabilityIds
      .map((id) => this.catalogue.describe(id))
      .filter((d): d is CapabilityDescriptor => d !== undefined);
  }

  /**
   * Calls left in the current window for a rate-limited capability.
   */
  remainingCalls(capabilityId: string): number | undefined {
    const descriptor = this.catalogue.describe(capabilityId);
    if (descriptor?.rateLimit === undefined) return undefined;
    return this.rateWindow.remaining(
      capabilityId,
      descriptor.rateLimit,
      descriptor.rateWindowSeconds,
    );
  }

  resetRateLimits(capabilityId?: string): void {
    this.rateWindow.reset(capabilityId);
  }

  private getObservabilityDeps(): ObservabilityDependencies {
    return {
      eventLog: this.eventLog,
      metrics: this.metrics,
      logger: this.logger,
      clock: this.clock,
    };
  }
}
