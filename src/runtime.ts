import type { AgentDefinition } from "./types/Agent.js";
import type { TextGenerationBackend } from "./types/Backend.js";
import type { CapabilityDescriptor, CapabilityHandle } from "./types/Capability.js";
import type { Job, JobOutcome } from "./types/Job.js";
import { CapabilityCatalogue } from "./registry/CapabilityCatalogue.js";
import { InMemoryAgentRegistry } from "./registry/AgentRegistry.js";
import { InvocationGate } from "./core/InvocationGate.js";
import { JobLedger } from "./jobs/JobLedger.js";
import { createJob, type CreateJobInput } from "./jobs/createJob.js";
import { ExecutionOrchestrator } from "./orchestrator/ExecutionOrchestrator.js";
import type { CapabilityDefinition } from "./capabilities/defineCapability.js";
import { OpenAICompatibleBackend } from "./llm/OpenAICompatibleBackend.js";
import { loadRuntimeConfig } from "./config/RuntimeConfig.js";
import { EventLog } from "./observability/EventLog.js";
import { Metrics } from "./observability/Metrics.js";
import { createLogger } from "./observability/Logger.js";
import type { DebugOptions, Logger } from "./observability/Logger.js";

export interface JobRuntimeOptions {
  backend: TextGenerationBackend;
  catalogue?: CapabilityCatalogue;
  agents?: InMemoryAgentRegistry;
  eventLog?: EventLog;
  metrics?: Metrics;
  debug?: DebugOptions;
  clock?: () => number;
  /** Applied by createJob() when the input has no timeout */
  jobTimeoutSeconds?: number;
  /** Advisory limit for submission layers; not enforced here */
  maxConcurrentJobs?: number;
}

/**
 * One explicitly wired set of catalogue, gate, ledger, agent registry and
 * orchestrator.
 *
 * @example
 * const runtime = createJobRuntime({ backend });
 * runtime.registerAgent(SUMMARY_AGENT);
 * const outcome = await runtime.submit(createSummaryJob({ ... }));
 * runtime.dispose();
 */
export class JobRuntime {
  readonly catalogue: CapabilityCatalogue;
  readonly agents: InMemoryAgentRegistry;
  readonly gate: InvocationGate;
  readonly ledger: JobLedger;
  readonly orchestrator: ExecutionOrchestrator;
  readonly jobTimeoutSeconds?: number;
  readonly maxConcurrentJobs?: number;
  private readonly eventLog: EventLog;
  private readonly metrics: Metrics;
  private readonly logger: Logger;

  constructor(options: JobRuntimeOptions) {
    const clock = options.clock ?? Date.now;
    this.catalogue = options.catalogue ?? new CapabilityCatalogue();
    this.agents = options.agents ?? new InMemoryAgentRegistry();
    this.eventLog = options.eventLog ?? new EventLog();
    this.metrics = options.metrics ?? new Metrics();
    this.ledger = new JobLedger({ clock });
    this.jobTimeoutSeconds = options.jobTimeoutSeconds;
    this.maxConcurrentJobs = options.maxConcurrentJobs;
    this.logger = createLogger({ ...options.debug, prefix: "JobRuntime" });

    this.gate = new InvocationGate({
      catalogue: this.catalogue,
      eventLog: this.eventLog,
      metrics: this.metrics,
      config: { debug: options.debug, clock },
    });
    this.orchestrator = new ExecutionOrchestrator({
      backend: options.backend,
      gate: this.gate,
      agents: this.agents,
      ledger: this.ledger,
      eventLog: this.eventLog,
      metrics: this.metrics,
      config: { debug: options.debug, clock },
    });

    if (this.logger.options.logEvents) {
      this.eventLog.on((entry) => {
        const event = entry.event;
        this.logger.debug("event", {
          seq: entry.seq,
          type: event.type,
          jobId: event.jobId,
          agentId: event.agentId,
          capabilityId: "capabilityId" in event ? event.capabilityId : undefined,
        });
      });
    }
  }

  registerAgent(agent: AgentDefinition): void {
    this.agents.register(agent);
  }

  listAgents(): AgentDefinition[] {
    return this.agents.list();
  }

  registerCapability(definition: CapabilityDefinition): void;
  registerCapability(descriptor: CapabilityDescriptor, handle: CapabilityHandle): void;
  registerCapability(
    first: CapabilityDefinition | CapabilityDescriptor,
    handle?: CapabilityHandle,
  ): void {
    if ("descriptor" in first) {
      this.catalogue.register(first.descriptor, first.handle);
    } else if (handle) {
      this.catalogue.register(first, handle);
    } else {
      throw new TypeError(`registerCapability(${first.id}) requires a handle`);
    }
  }

  /**
   * Build a pending job, applying the runtime's default timeout.
   */
  createJob(input: CreateJobInput): Job {
    return createJob({
      ...input,
      timeoutSeconds: input.timeoutSeconds ?? this.jobTimeoutSeconds,
    });
  }

  submit(job: Job): Promise<JobOutcome> {
    return this.orchestrator.submit(job);
  }

  cancel(jobId: string): boolean {
    return this.orchestrator.cancel(jobId);
  }

  listActiveJobs(): Job[] {
    return this.orchestrator.listActiveJobs();
  }

  getEventLog(): EventLog {
    return this.eventLog;
  }

  getMetrics(): Metrics {
    return this.metrics;
  }

  get isDisposed(): boolean {
    return this.orchestrator.isClosed;
  }

  /**
   * Cancel in-flight jobs, clear rate windows and drop listeners. Later
   * submissions resolve as failed.
   */
  dispose(): void {
    if (this.orchestrator.isClosed) return;
    const cancelled = this.orchestrator.close();
    this.gate.resetRateLimits();
    this.ledger.removeAllListeners();
    this.eventLog.removeAllListeners();
    this.logger.info("runtime.disposed", { cancelledJobs: cancelled.length });
  }
}

export function createJobRuntime(options: JobRuntimeOptions): JobRuntime {
  return new JobRuntime(options);
}

/**
 * Load a YAML config and build a runtime around an OpenAI-compatible
 * backend. `overrides.backend` replaces the configured backend.
 */
export async function createJobRuntimeFromConfig(
  configPath?: string,
  overrides: Partial<JobRuntimeOptions> = {},
): Promise<JobRuntime> {
  const { config } = await loadRuntimeConfig(configPath);

  let backend = overrides.backend;
  if (!backend) {
    if (!config.backend) {
      throw new Error("No backend configured: add a `backend` section or pass overrides.backend");
    }
    backend = new OpenAICompatibleBackend(config.backend);
  }

  return new JobRuntime({
    ...overrides,
    backend,
    debug: overrides.debug ?? config.debug,
    jobTimeoutSeconds: overrides.jobTimeoutSeconds ?? config.jobTimeoutSeconds,
    maxConcurrentJobs: overrides.maxConcurrentJobs ?? config.maxConcurrentJobs,
  });
}
