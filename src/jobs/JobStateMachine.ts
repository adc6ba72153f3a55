import type { Job, JobStatus, TerminalJobStatus } from "../types/Job.js";
import { InvalidTransitionError } from "../core/Errors.js";

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ["running"],
  running: ["completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(status: JobStatus): status is TerminalJobStatus {
  return status === "completed" || status === "failed" || status === "cancelled";
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Move a job to `to`, stamping startedAt on pending -> running and
 * completedAt on entry to a terminal status. Mutates and returns the job.
 */
export function transitionJob(job: Job, to: JobStatus, now: number = Date.now()): Job {
  if (!canTransition(job.status, to)) {
    throw new InvalidTransitionError(job.status, to);
  }
  job.status = to;
  if (to === "running") {
    job.startedAt = now;
  } else if (isTerminal(to)) {
    job.completedAt = now;
  }
  return job;
}
