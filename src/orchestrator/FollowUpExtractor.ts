import type { ActionItem } from "../types/Job.js";

const CHECKLIST_PREFIXES = ["- [", "* ["];

/**
 * Collect checklist lines (`- [ ] ...`, `* [x] ...`) from a response as
 * action items. Other lines are ignored.
 */
export function extractFollowUps(text: string): ActionItem[] {
  const items: ActionItem[] = [];

  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (!CHECKLIST_PREFIXES.some((p) => line.startsWith(p))) continue;

    const close = line.indexOf("]");
    const description = (close === -1 ? line : line.slice(close + 1)).trim();
    if (!description || description.startsWith("[")) continue;

    items.push({ description, priority: "medium" });
  }

  return items;
}
