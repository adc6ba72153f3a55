import { EventEmitter } from "eventemitter3";
import type { Job } from "../types/Job.js";
import { transitionJob } from "./JobStateMachine.js";

export type LedgerEvent = "tracked" | "untracked" | "cancelled";

/**
 * In-memory table of in-flight jobs.
 *
 * Every mutation runs to completion without an await, so track, untrack
 * and cancel never interleave. `cancel` is the compare-and-transition used
 * to avoid cancelling a job that already finished.
 */
export class JobLedger {
  private readonly jobs = new Map<string, Job>();
  private readonly emitter = new EventEmitter();
  private readonly clock: () => number;

  constructor(options: { clock?: () => number } = {}) {
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Insert under job.id. An existing entry with the same id is replaced.
   */
  track(job: Job): void {
    this.jobs.set(job.id, job);
    this.emitter.emit("tracked", job);
  }

  untrack(jobId: string): void {
    const job = this.jobs.get(jobId);
    if (!job) return;
    this.jobs.delete(jobId);
    this.emitter.emit("untracked", job);
  }

  /**
   * Cancel a tracked running job. Returns false when the job is unknown
   * or no longer running.
   */
  cancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== "running") return false;

    transitionJob(job, "cancelled", this.clock());
    this.jobs.delete(jobId);
    this.emitter.emit("cancelled", job);
    return true;
  }

  get(jobId: string): Job | undefined {
    return this.jobs.get(jobId);
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  /**
   * Snapshot of in-flight jobs.
   */
  list(filter?: { agentId?: string }): Job[] {
    let results = [...this.jobs.values()];
    if (filter?.agentId) {
      results = results.filter((j) => j.agentId === filter.agentId);
    }
    return results;
  }

  get size(): number {
    return this.jobs.size;
  }

  on(event: LedgerEvent, listener: (job: Job) => void): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
