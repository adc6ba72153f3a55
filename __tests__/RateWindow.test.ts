import { describe, it, expect, beforeEach } from "vitest";
import { RateWindow } from "../src/core/RateWindow.js";

describe("RateWindow", () => {
  let now: number;
  let window: RateWindow;

  beforeEach(() => {
    now = 1_000_000;
    window = new RateWindow({ clock: () => now });
  });

  it("allows up to the limit within the window", () => {
    const results = [1, 2, 3].map(() => window.allow("search", 2, 60));
    expect(results).toEqual([true, true, false]);
  });

  it("allows again once the window has passed", () => {
    window.allow("search", 2, 60);
    window.allow("search", 2, 60);
    expect(window.allow("search", 2, 60)).toBe(false);

    now += 60_001;
    expect(window.allow("search", 2, 60)).toBe(true);
  });

  it("treats a timestamp exactly one window old as expired", () => {
    window.allow("search", 1, 60);
    now += 60_000;
    expect(window.allow("search", 1, 60)).toBe(true);
  });

  it("always allows when no limit is set, without recording", () => {
    for (let i = 0; i < 5; i++) {
      expect(window.allow("web", undefined, 60)).toBe(true);
    }
    expect(window.remaining("web", 1, 60)).toBe(1);
  });

  it("keeps separate windows per capability", () => {
    expect(window.allow("a", 1, 60)).toBe(true);
    expect(window.allow("b", 1, 60)).toBe(true);
    expect(window.allow("a", 1, 60)).toBe(false);
  });

  it("denies every call with a limit of zero", () => {
    expect(window.allow("blocked", 0, 60)).toBe(false);
  });

  it("reports remaining calls and resets", () => {
    window.allow("search", 3, 60);
    expect(window.remaining("search", 3, 60)).toBe(2);

    window.reset("search");
    expect(window.remaining("search", 3, 60)).toBe(3);
  });
});
