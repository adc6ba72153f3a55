import pTimeout, { TimeoutError } from "p-timeout";
import type { AgentDefinition } from "../types/Agent.js";
import type {
  GenerationRequest,
  GenerationResponse,
  RequestedCall,
  TextGenerationBackend,
} from "../types/Backend.js";
import type { InvocationContext } from "../types/Capability.js";
import type { Job, JobOutcome, JobStatus, TerminalJobStatus } from "../types/Job.js";
import type { AnyRuntimeEvent } from "../types/Events.js";
import type { InvocationOutcome } from "../types/Outcome.js";
import type { InvocationGate } from "../core/InvocationGate.js";
import { RuntimeError, createTaggedError, describeError, errorKindOf } from "../core/Errors.js";
import type { AgentRegistry } from "../registry/AgentRegistry.js";
import { JobLedger } from "../jobs/JobLedger.js";
import { canTransition, transitionJob } from "../jobs/JobStateMachine.js";
import { EventLog } from "../observability/EventLog.js";
import { Metrics } from "../observability/Metrics.js";
import { createLogger, summarizeForLog } from "../observability/Logger.js";
import type { DebugOptions, Logger } from "../observability/Logger.js";
import { buildPrompt } from "./PromptBuilder.js";
import { extractFollowUps } from "./FollowUpExtractor.js";

export interface ExecutionOrchestratorConfig {
  debug?: DebugOptions;
  /** Time source for job timestamps (epoch ms) */
  clock?: () => number;
}

export interface ExecutionOrchestratorOptions {
  backend: TextGenerationBackend;
  gate: InvocationGate;
  agents: AgentRegistry;
  ledger?: JobLedger;
  eventLog?: EventLog;
  metrics?: Metrics;
  config?: ExecutionOrchestratorConfig;
}

interface GenerationResult {
  response: GenerationResponse;
  capabilityOutcomes: InvocationOutcome[];
}

/**
 * Drives one job from pending to a terminal status:
 * track, prompt, generate (bounded by the job's timeout), route requested
 * capability calls through the gate, extract follow-ups, untrack.
 *
 * submit() never rejects; every failure becomes a JobOutcome.
 */
export class ExecutionOrchestrator {
  private readonly backend: TextGenerationBackend;
  private readonly gate: InvocationGate;
  private readonly agents: AgentRegistry;
  private readonly ledger: JobLedger;
  private readonly eventLog: EventLog;
  private readonly metrics: Metrics;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly controllers = new Map<string, AbortController>();
  private closed = false;

  constructor(options: ExecutionOrchestratorOptions) {
    const config = options.config ?? {};
    this.backend = options.backend;
    this.gate = options.gate;
    this.clock = config.clock ?? Date.now;
    this.agents = options.agents;
    this.ledger = options.ledger ?? new JobLedger({ clock: this.clock });
    this.eventLog = options.eventLog ?? this.gate.getEventLog();
    this.metrics = options.metrics ?? this.gate.getMetrics();
    this.logger = createLogger({ ...config.debug, prefix: "ExecutionOrchestrator" });
  }

  listActiveJobs(): Job[] {
    return this.ledger.list();
  }

  getLedger(): JobLedger {
    return this.ledger;
  }

  /**
   * Run a job to completion.
   */
  async submit(job: Job): Promise<JobOutcome> {
    this.notify({
      type: "JOB_SUBMITTED",
      timestamp: new Date(this.clock()).toISOString(),
      jobId: job.id,
      agentId: job.agentId,
    });

    if (this.closed) {
      return this.rejectUntracked(job, "Orchestrator is closed");
    }
    const agent = this.agents.get(job.agentId);
    if (!agent) {
      return this.rejectUntracked(job, `Agent not found: ${job.agentId}`);
    }
    if (!canTransition(job.status, "running")) {
      return this.rejectUntracked(job, `Job ${job.id} cannot start from status ${job.status}`);
    }

    const controller = new AbortController();
    this.controllers.set(job.id, controller);
    let completed: JobOutcome | undefined;

    try {
      this.ledger.track(job);
      transitionJob(job, "running", this.clock());

      this.logger.info("job.start", { jobId: job.id, agentId: agent.id });
      this.notify({
        type: "JOB_STARTED",
        timestamp: new Date(this.clock()).toISOString(),
        jobId: job.id,
        agentId: agent.id,
      });

      const { response, capabilityOutcomes } = await this.generate(agent, job, controller.signal);
      const actionItems = extractFollowUps(response.content);

      if (!this.isRunning(job)) {
        return this.cancelledOutcome(job);
      }
      transitionJob(job, "completed", this.clock());

      completed = {
        ...this.baseOutcome(job, "completed"),
        response: response.content,
        actionItems,
        capabilityOutcomes,
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
      };

      const durationMs = this.durationOf(job);
      this.metrics.recordJob("completed", durationMs);
      this.notify({
        type: "JOB_COMPLETED",
        timestamp: new Date(this.clock()).toISOString(),
        jobId: job.id,
        agentId: job.agentId,
        durationMs: durationMs ?? 0,
        actionItemCount: actionItems.length,
      });
      this.logger.info("job.completed", {
        jobId: job.id,
        durationMs,
        capabilityCalls: capabilityOutcomes.length,
        response: this.logger.options.includeOutputs
          ? summarizeForLog(response.content)
          : undefined,
      });
      return completed;
    } catch (error) {
      if (completed) return completed;
      if (this.isRunning(job)) return this.failRunning(job, error);
      // A ledger listener threw before the job started.
      if (job.status === "pending") return this.rejectUntracked(job, describeError(error));
      return this.cancelledOutcome(job);
    } finally {
      if (this.controllers.get(job.id) === controller) {
        this.controllers.delete(job.id);
      }
      this.release(job.id);
    }
  }

  /**
   * Cancel a running job. The ledger transition happens first; the job's
   * in-flight backend call and capability calls are then aborted.
   */
  cancel(jobId: string): boolean {
    const job = this.ledger.get(jobId);
    if (!this.ledger.cancel(jobId)) return false;

    this.controllers
      .get(jobId)
      ?.abort(createTaggedError("CANCELLED", `Job ${jobId} was cancelled`));

    this.logger.info("job.cancelled", { jobId });
    this.notify({
      type: "JOB_CANCELLED",
      timestamp: new Date(this.clock()).toISOString(),
      jobId,
      agentId: job?.agentId,
    });
    return true;
  }

  /**
   * Cancel every tracked running job. Returns the ids that were cancelled.
   */
  cancelAll(): string[] {
    return this.ledger
      .list()
      .map((job) => job.id)
      .filter((id) => this.cancel(id));
  }

  /**
   * Cancel in-flight jobs and reject later submissions.
   */
  close(): string[] {
    this.closed = true;
    return this.cancelAll();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private async generate(
    agent: AgentDefinition,
    job: Job,
    signal: AbortSignal,
  ): Promise<GenerationResult> {
    const descriptors = this.gate.resolveDescriptors(job.allowedCapabilities);
    const request: GenerationRequest = {
      messages: buildPrompt(agent, job),
      capabilities: descriptors.length > 0 ? descriptors : undefined,
      temperature: agent.config.temperature,
      maxTokens: agent.config.maxTokens,
      topP: agent.config.topP,
      model: agent.config.modelName,
    };

    this.logger.debug("backend.request", {
      jobId: job.id,
      messages: request.messages.length,
      capabilities: descriptors.map((d) => d.id),
    });

    let response: GenerationResponse;
    try {
      response = await pTimeout(this.backend.generate(request, { signal }), {
        milliseconds: timerMilliseconds(job.timeoutSeconds),
        signal,
      });
    } catch (error) {
      throw this.classifyBackendError(error, job, signal);
    }

    this.logger.debug("backend.response", {
      jobId: job.id,
      toolCalls: response.toolCalls.length,
      inputTokens: response.usage.inputTokens,
      outputTokens: response.usage.outputTokens,
    });

    const capabilityOutcomes =
      response.toolCalls.length > 0
        ? await this.invokeRequested(job, response.toolCalls, signal)
        : [];

    return { response, capabilityOutcomes };
  }

  private classifyBackendError(error: unknown, job: Job, signal: AbortSignal): Error {
    if (error instanceof TimeoutError) {
      const controller = this.controllers.get(job.id);
      controller?.abort(error);
      return createTaggedError(
        "TIMEOUT",
        `timeout: backend did not respond within ${job.timeoutSeconds}s`,
      );
    }
    if (signal.aborted) {
      return createTaggedError("CANCELLED", `Job ${job.id} was cancelled`);
    }
    if (error instanceof RuntimeError && error.kind === "BACKEND_FAILURE") {
      return error;
    }
    return createTaggedError("BACKEND_FAILURE", describeError(error), error);
  }

  /**
   * Fan out the backend's requested calls through the gate; outcomes keep
   * request order.
   */
  private invokeRequested(
    job: Job,
    calls: RequestedCall[],
    signal: AbortSignal,
  ): Promise<InvocationOutcome[]> {
    const ctx: InvocationContext = {
      callId: job.id,
      jobId: job.id,
      agentId: job.agentId,
      chatId: job.context.chatId,
      threadId: job.context.threadId,
      userId: job.context.callerId,
      signal,
    };
    return this.gate.executeBatch(
      calls.map((call) => ({
        capabilityId: call.capabilityId,
        parameters: call.parameters,
        callId: call.id,
      })),
      ctx,
    );
  }

  private failRunning(job: Job, error: unknown): JobOutcome {
    const message = describeError(error);
    const fromStatus: JobStatus = job.status;
    transitionJob(job, "failed", this.clock());

    const durationMs = this.durationOf(job);
    this.metrics.recordJob("failed", durationMs);
    this.logger.warn("job.failed", {
      jobId: job.id,
      kind: errorKindOf(error, "BACKEND_FAILURE"),
      error: message,
    });
    this.notify({
      type: "JOB_FAILED",
      timestamp: new Date(this.clock()).toISOString(),
      jobId: job.id,
      agentId: job.agentId,
      error: message,
      fromStatus,
    });

    return { ...this.emptyOutcome(job, "failed"), error: message };
  }

  /**
   * Outcome for a job that never started. Its status stays as submitted
   * since no transition took place.
   */
  private rejectUntracked(job: Job, message: string): JobOutcome {
    this.metrics.recordJob("failed");
    this.logger.warn("job.rejected", { jobId: job.id, agentId: job.agentId, error: message });
    this.notify({
      type: "JOB_FAILED",
      timestamp: new Date(this.clock()).toISOString(),
      jobId: job.id,
      agentId: job.agentId,
      error: message,
      fromStatus: job.status,
    });
    return { ...this.emptyOutcome(job, "failed"), error: message };
  }

  private cancelledOutcome(job: Job): JobOutcome {
    this.metrics.recordJob("cancelled", this.durationOf(job));
    this.logger.debug("job.discarded", { jobId: job.id });
    return this.emptyOutcome(job, "cancelled");
  }

  private emptyOutcome(job: Job, status: TerminalJobStatus): JobOutcome {
    return {
      ...this.baseOutcome(job, status),
      response: "",
      actionItems: [],
      capabilityOutcomes: [],
      inputTokens: 0,
      outputTokens: 0,
    };
  }

  private baseOutcome(
    job: Job,
    status: TerminalJobStatus,
  ): Pick<JobOutcome, "jobId" | "agentId" | "status" | "startedAt" | "completedAt" | "job"> {
    return {
      jobId: job.id,
      agentId: job.agentId,
      status,
      startedAt: job.startedAt,
      completedAt: job.completedAt,
      job,
    };
  }

  private durationOf(job: Job): number | undefined {
    if (job.startedAt === undefined || job.completedAt === undefined) return undefined;
    return job.completedAt - job.startedAt;
  }

  /**
   * Append to the event log. A throwing subscriber is logged and does not
   * abort the job.
   */
  private notify(event: AnyRuntimeEvent): void {
    try {
      this.eventLog.append(event);
    } catch (error) {
      this.logger.warn("event.listener_failed", {
        type: event.type,
        jobId: event.jobId,
        error: describeError(error),
      });
    }
  }

  private release(jobId: string): void {
    try {
      this.ledger.untrack(jobId);
    } catch (error) {
      this.logger.warn("ledger.listener_failed", { jobId, error: describeError(error) });
    }
  }

  // Status may change under cancel() while submit() is suspended.
  private isRunning(job: Job): boolean {
    return job.status === "running";
  }
}

// setTimeout clamps delays above this to 1ms.
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Timer budget for p-timeout. Budgets too large for a Node timer mean no timer.
 */
export function timerMilliseconds(timeoutSeconds: number): number {
  const ms = timeoutSeconds * 1000;
  return ms > MAX_TIMER_MS ? Number.POSITIVE_INFINITY : ms;
}
