import { describe, it, expect, beforeEach, vi } from "vitest";
import { InvocationGate } from "../src/core/InvocationGate.js";
import { CapabilityCatalogue } from "../src/registry/CapabilityCatalogue.js";
import { defineCapability, registerCapability } from "../src/capabilities/defineCapability.js";
import { calculatorCapability, defaultCtx, makeSecureNoteCapability } from "./fixtures/index.js";

describe("InvocationGate", () => {
  let now: number;
  let catalogue: CapabilityCatalogue;
  let gate: InvocationGate;

  beforeEach(() => {
    now = 5_000;
    catalogue = new CapabilityCatalogue();
    gate = new InvocationGate({ catalogue, config: { clock: () => now } });
    registerCapability(catalogue, calculatorCapability);
  });

  describe("successful invocation", () => {
    it("executes the handle and returns a completed outcome", async () => {
      const outcome = await gate.execute("calculator", { a: 2, b: 3 }, defaultCtx);

      expect(outcome).toEqual({
        capabilityId: "calculator",
        callId: "call-1",
        status: "completed",
        output: { sum: 5 },
        startedAt: 5_000,
        completedAt: 5_000,
      });
    });

    it("passes the context through to the handle", async () => {
      const execute = vi.fn().mockReturnValue("ok");
      registerCapability(
        catalogue,
        defineCapability({
          descriptor: { id: "echo", category: "code", description: "Echo", inputSchema: { type: "object" } },
          execute,
        }),
      );

      await gate.execute("echo", { x: 1 }, { ...defaultCtx, userId: "user-9" });
      expect(execute).toHaveBeenCalledWith({ x: 1 }, { ...defaultCtx, userId: "user-9" });
    });
  });

  describe("ordered checks", () => {
    it("fails with not found for an unknown capability", async () => {
      const outcome = await gate.execute("nope", {}, defaultCtx);
      expect(outcome.status).toBe("failed");
      expect(outcome.errorKind).toBe("NOT_FOUND");
      expect(outcome.error).toBe("Capability not found: nope");
    });

    it("fails with not found after deregistration", async () => {
      catalogue.deregister("calculator");
      const outcome = await gate.execute("calculator", { a: 1, b: 1 }, defaultCtx);
      expect(outcome.status).toBe("failed");
      expect(outcome.error).toBe("Capability not found: calculator");
    });

    it("checks authorization before the rate limit", async () => {
      registerCapability(catalogue, makeSecureNoteCapability());
      const authed = { ...defaultCtx, userId: "user-1" };

      const first = await gate.execute("secure_note", { text: "hi" }, authed);
      expect(first.status).toBe("completed");
      const limited = await gate.execute("secure_note", { text: "hi" }, authed);
      expect(limited.errorKind).toBe("RATE_LIMITED");

      const anonymous = await gate.execute("secure_note", { text: "hi" }, defaultCtx);
      expect(anonymous.status).toBe("unauthorized");
      expect(anonymous.errorKind).toBe("UNAUTHORIZED");
      expect(anonymous.error).toBe(
        "Permission denied: capability secure_note requires an authenticated caller",
      );
    });

    it("checks the rate limit before parameters", async () => {
      registerCapability(catalogue, makeSecureNoteCapability());
      const authed = { ...defaultCtx, userId: "user-1" };

      await gate.execute("secure_note", { text: "hi" }, authed);
      const outcome = await gate.execute("secure_note", { wrong: true }, authed);
      expect(outcome.error).toBe("Rate limit exceeded for capability: secure_note");
    });

    it("rejects invalid parameters without executing", async () => {
      const execute = vi.fn();
      registerCapability(catalogue, makeSecureNoteCapability(execute));

      const outcome = await gate.execute("secure_note", { text: 42 }, { ...defaultCtx, userId: "u" });
      expect(outcome.status).toBe("failed");
      expect(outcome.error).toBe("Invalid parameters for capability: secure_note");
      expect(execute).not.toHaveBeenCalled();
    });

    it("does not mutate parameters while validating", async () => {
      registerCapability(
        catalogue,
        defineCapability({
          descriptor: {
            id: "defaults",
            category: "code",
            description: "Schema with a default",
            inputSchema: { type: "object", properties: { n: { type: "number", default: 3 } } },
          },
          execute: (params) => params,
        }),
      );
      const params = {};
      const outcome = await gate.execute("defaults", params, defaultCtx);
      expect(outcome.output).toEqual({});
      expect(params).toEqual({});
    });

    it("treats a throwing validator as invalid parameters", async () => {
      registerCapability(
        catalogue,
        defineCapability({
          descriptor: { id: "strict", category: "code", description: "Strict", inputSchema: { type: "object" } },
          validate: () => {
            throw new Error("bad shape");
          },
          execute: () => "never",
        }),
      );
      const outcome = await gate.execute("strict", {}, defaultCtx);
      expect(outcome.error).toBe("Invalid parameters for capability: strict (bad shape)");
    });
  });

  describe("dispatch failures", () => {
    it("converts a thrown error into a failed outcome", async () => {
      registerCapability(
        catalogue,
        defineCapability({
          descriptor: { id: "boom", category: "code", description: "Throws", inputSchema: { type: "object" } },
          execute: async () => {
            throw new Error("disk full");
          },
        }),
      );

      const outcome = await gate.execute("boom", {}, defaultCtx);
      expect(outcome.status).toBe("failed");
      expect(outcome.errorKind).toBe("CAPABILITY_EXECUTION_FAILURE");
      expect(outcome.error).toBe("disk full");
    });

    it("does not dispatch when the context signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const outcome = await gate.execute("calculator", { a: 1, b: 2 }, {
        ...defaultCtx,
        signal: controller.signal,
      });
      expect(outcome.errorKind).toBe("CANCELLED");
      expect(outcome.error).toBe("Invocation of calculator aborted before dispatch");
    });
  });

  describe("executeBatch", () => {
    it("returns outcomes in input order with independent failures", async () => {
      registerCapability(
        catalogue,
        defineCapability({
          descriptor: { id: "slow", category: "code", description: "Slow", inputSchema: { type: "object" } },
          execute: () => new Promise((resolve) => setTimeout(() => resolve("slow done"), 20)),
        }),
      );

      const outcomes = await gate.executeBatch(
        [
          { capabilityId: "slow", parameters: {}, callId: "c1" },
          { capabilityId: "missing", parameters: {}, callId: "c2" },
          { capabilityId: "calculator", parameters: { a: 1, b: 1 }, callId: "c3" },
        ],
        defaultCtx,
      );

      expect(outcomes.map((o) => [o.callId, o.status])).toEqual([
        ["c1", "completed"],
        ["c2", "failed"],
        ["c3", "completed"],
      ]);
      expect(outcomes[0]?.output).toBe("slow done");
    });

    it("dispatches calls concurrently", async () => {
      let releaseFirst: () => void = () => {};
      const firstWaiting = new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      registerCapability(
        catalogue,
        defineCapability({
          descriptor: { id: "waits", category: "code", description: "Waits", inputSchema: { type: "object" } },
          execute: async () => {
            await firstWaiting;
            return "first";
          },
        }),
      );
      registerCapability(
        catalogue,
        defineCapability({
          descriptor: { id: "releases", category: "code", description: "Releases", inputSchema: { type: "object" } },
          execute: () => {
            releaseFirst();
            return "second";
          },
        }),
      );

      const outcomes = await gate.executeBatch(
        [
          { capabilityId: "waits", parameters: {}, callId: "c1" },
          { capabilityId: "releases", parameters: {}, callId: "c2" },
        ],
        defaultCtx,
      );

      expect(outcomes.map((o) => [o.callId, o.status, o.output])).toEqual([
        ["c1", "completed", "first"],
        ["c2", "completed", "second"],
      ]);
    });
  });

  describe("resolveDescriptors", () => {
    it("skips ids that do not resolve", () => {
      const ids = gate.resolveDescriptors(["missing", "calculator"]).map((d) => d.id);
      expect(ids).toEqual(["calculator"]);
    });
  });

  describe("observability", () => {
    it("records events and metrics for a denial", async () => {
      await gate.execute("nope", {}, defaultCtx);

      const types = gate.getEventLog().getAll().map((e) => e.event.type);
      expect(types).toEqual(["CAPABILITY_CALLED", "CAPABILITY_DENIED", "CAPABILITY_RESULT"]);
      expect(gate.getEventLog().getAll().map((e) => e.event.timestamp)).toEqual([
        "1970-01-01T00:00:05.000Z",
        "1970-01-01T00:00:05.000Z",
        "1970-01-01T00:00:05.000Z",
      ]);
      expect(
        gate.getMetrics().getCounter("capability_denied_total", { capabilityId: "nope", kind: "NOT_FOUND" }),
      ).toBe(1);
      expect(
        gate.getMetrics().getCounter("capability_invocations_total", {
          capabilityId: "nope",
          status: "failed",
        }),
      ).toBe(1);
    });

    it("redacts secrets in the parameter summary", async () => {
      await gate.execute("calculator", { a: 1, b: 2, token: "test-secret" }, defaultCtx);
      const called = gate.getEventLog().query({ type: "CAPABILITY_CALLED" })[0]?.event;
      expect(called && "parametersSummary" in called ? called.parametersSummary : undefined).toBe(
        '{"a":1,"b":2,"token":"[REDACTED]"}',
      );
    });

    it("reports remaining calls for rate-limited capabilities", async () => {
      registerCapability(catalogue, makeSecureNoteCapability());
      expect(gate.remainingCalls("secure_note")).toBe(1);
      await gate.execute("secure_note", { text: "x" }, { ...defaultCtx, userId: "u" });
      expect(gate.remainingCalls("secure_note")).toBe(0);
      gate.resetRateLimits();
      expect(gate.remainingCalls("secure_note")).toBe(1);
      expect(gate.remainingCalls("calculator")).toBeUndefined();
    });
  });
});
