import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createLogger,
  resolveDebugOptions,
  sanitizeForLog,
  summarizeForLog,
} from "../../src/observability/Logger.js";

describe("Logger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("writes prefixed lines at or above the level", () => {
    const sink = vi.fn();
    const logger = createLogger({ enabled: true, level: "info", prefix: "Test", sink });

    logger.info("job.start", { jobId: "j1", skipped: undefined });
    logger.debug("hidden");
    logger.error("boom");

    expect(sink.mock.calls).toEqual([
      ["info", '[Test] [INFO] job.start {"jobId":"j1"}'],
      ["error", "[Test] [ERROR] boom"],
    ]);
  });

  it("is silent unless enabled", () => {
    vi.stubEnv("JOB_RUNTIME_LOG_LEVEL", "");
    vi.stubEnv("DEBUG", "");
    const sink = vi.fn();
    createLogger({ sink }).error("nope");
    expect(sink).not.toHaveBeenCalled();
  });

  it("reads the level from the environment", () => {
    vi.stubEnv("JOB_RUNTIME_LOG_LEVEL", "debug");
    expect(resolveDebugOptions()).toMatchObject({ enabled: true, level: "debug" });

    vi.stubEnv("JOB_RUNTIME_LOG_LEVEL", "off");
    expect(resolveDebugOptions()).toMatchObject({ enabled: false, level: "silent" });
  });

  it("redacts credential-looking fields", () => {
    expect(sanitizeForLog({ user: "ann", password: "test-secret", apiKey: "test-key" })).toBe(
      '{"user":"ann","password":"[REDACTED]","apiKey":"[REDACTED]"}',
    );
  });

  it("redacts a secret that crosses the truncation point", () => {
    expect(sanitizeForLog({ token: "a".repeat(40) }, 20)).toBe('{"token":"[REDACTED]...');
  });

  it("summarizes values by shape", () => {
    expect(summarizeForLog([1, 2, 3])).toBe("Array(3)");
    expect(summarizeForLog({ a: 1, b: 2 })).toBe("Object(keys: a, b)");
    expect(summarizeForLog("abcdef", 3)).toBe("abc...");
  });
});
