import { describe, it, expect } from "vitest";
import { canTransition, isTerminal, transitionJob } from "../src/jobs/JobStateMachine.js";
import { InvalidTransitionError } from "../src/core/Errors.js";
import { makeJob } from "./fixtures/index.js";

describe("JobStateMachine", () => {
  it("allows pending -> running -> terminal only", () => {
    expect(canTransition("pending", "running")).toBe(true);
    expect(canTransition("pending", "completed")).toBe(false);
    expect(canTransition("running", "completed")).toBe(true);
    expect(canTransition("running", "failed")).toBe(true);
    expect(canTransition("running", "cancelled")).toBe(true);
    expect(canTransition("running", "pending")).toBe(false);
  });

  it("has no transition out of a terminal status", () => {
    for (const from of ["completed", "failed", "cancelled"] as const) {
      expect(isTerminal(from)).toBe(true);
      for (const to of ["pending", "running", "completed", "failed", "cancelled"] as const) {
        expect(canTransition(from, to)).toBe(false);
      }
    }
    expect(isTerminal("running")).toBe(false);
  });

  it("stamps startedAt on start and completedAt on finish", () => {
    const job = makeJob();
    transitionJob(job, "running", 2_000);
    expect(job.status).toBe("running");
    expect(job.startedAt).toBe(2_000);
    expect(job.completedAt).toBeUndefined();

    transitionJob(job, "completed", 3_500);
    expect(job.status).toBe("completed");
    expect(job.startedAt).toBe(2_000);
    expect(job.completedAt).toBe(3_500);
  });

  it("throws on an invalid transition and leaves the job unchanged", () => {
    const job = makeJob();
    expect(() => transitionJob(job, "failed", 2_000)).toThrow(InvalidTransitionError);
    expect(() => transitionJob(job, "failed", 2_000)).toThrow(
      "Invalid job transition: pending -> failed",
    );
    expect(job.status).toBe("pending");
    expect(job.completedAt).toBeUndefined();
  });
});
