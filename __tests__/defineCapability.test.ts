import { describe, it, expect, vi } from "vitest";
import { createDescriptor, defineCapability } from "../src/capabilities/defineCapability.js";
import { calculatorCapability, defaultCtx } from "./fixtures/index.js";

describe("defineCapability", () => {
  it("fills descriptor defaults", () => {
    expect(
      createDescriptor({ id: "memory_read", category: "memory_read", description: "Read", inputSchema: {} }),
    ).toEqual({
      id: "memory_read",
      name: "memory_read",
      category: "memory_read",
      description: "Read",
      inputSchema: {},
      requiresAuth: false,
      authScopes: [],
      rateWindowSeconds: 60,
      riskLevel: "low",
      isActive: true,
      metadata: {},
    });
  });

  it("validates against the input schema by default", () => {
    expect(calculatorCapability.handle.validate({ a: 1, b: 2 })).toBe(true);
    expect(calculatorCapability.handle.validate({ a: 1 })).toBe(false);
    expect(calculatorCapability.handle.validate({ a: 1, b: 2, c: 3 })).toBe(false);
  });

  it("uses a custom validator when given", () => {
    const validate = vi.fn().mockReturnValue(false);
    const def = defineCapability({
      descriptor: { id: "x", category: "code", description: "X", inputSchema: { type: "object" } },
      validate,
      execute: () => "ran",
    });
    expect(def.handle.validate({})).toBe(false);
    expect(validate).toHaveBeenCalledWith({});
  });

  it("delegates execution", async () => {
    expect(await calculatorCapability.handle.execute({ a: 4, b: 5 }, defaultCtx)).toEqual({ sum: 9 });
  });
});
