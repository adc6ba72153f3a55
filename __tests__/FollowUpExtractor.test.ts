import { describe, it, expect } from "vitest";
import { extractFollowUps } from "../src/orchestrator/FollowUpExtractor.js";

describe("extractFollowUps", () => {
  it("extracts checklist lines in order", () => {
    const items = extractFollowUps("- [ ] call Bob\nsome text\n* [x] ship it");
    expect(items).toEqual([
      { description: "call Bob", priority: "medium" },
      { description: "ship it", priority: "medium" },
    ]);
  });

  it("trims surrounding whitespace", () => {
    expect(extractFollowUps("   - [ ]   book the room   ").map((i) => i.description)).toEqual([
      "book the room",
    ]);
  });

  it("skips items whose text starts with a bracket or is empty", () => {
    expect(extractFollowUps("- [ ] [link](x)\n- [ ]\n* [x]   ")).toEqual([]);
  });

  it("uses the whole line when there is no closing bracket", () => {
    expect(extractFollowUps("- [ unfinished").map((i) => i.description)).toEqual(["- [ unfinished"]);
  });

  it("ignores other list styles", () => {
    expect(extractFollowUps("- plain bullet\n1. [ ] numbered\n+ [ ] plus")).toEqual([]);
  });

  it("returns nothing for empty text", () => {
    expect(extractFollowUps("")).toEqual([]);
  });
});
