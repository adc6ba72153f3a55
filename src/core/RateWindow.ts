/**
 * Per-capability sliding-window call counter.
 *
 * Each `allow()` prunes, compares and appends in one synchronous section,
 * so concurrent async callers on the same capability cannot interleave
 * inside it.
 */
export class RateWindow {
  private readonly timestamps = new Map<string, number[]>();
  private readonly now: () => number;

  constructor(options: { clock?: () => number } = {}) {
    this.now = options.clock ?? Date.now;
  }

  /**
   * Record a call and return true if `capabilityId` is under `limit` calls
   * in the last `windowSeconds`. No limit always allows without recording.
   */
  allow(
    capabilityId: string,
    limit: number | undefined,
    windowSeconds: number,
  ): boolean {
    if (limit === undefined) return true;

    const now = this.now();
    const cutoff = now - windowSeconds * 1000;
    const recorded = this.timestamps.get(capabilityId) ?? [];

    // Drop expired entries (oldest first)
    let firstLive = 0;
    while (firstLive < recorded.length && (recorded[firstLive] ?? 0) <= cutoff) {
      firstLive++;
    }
    const live = firstLive > 0 ? recorded.slice(firstLive) : recorded;

    if (live.length >= limit) {
      this.timestamps.set(capabilityId, live);
      return false;
    }
    live.push(now);
    this.timestamps.set(capabilityId, live);
    return true;
  }

  /**
   * Calls still available in the current window.
   */
  remaining(capabilityId: string, limit: number, windowSeconds: number): number {
    const cutoff = this.now() - windowSeconds * 1000;
    const live = (this.timestamps.get(capabilityId) ?? []).filter((t) => t > cutoff);
    return Math.max(0, limit - live.length);
  }

  /**
   * Forget recorded calls for one capability, or for all when omitted.
   */
  reset(capabilityId?: string): void {
    if (capabilityId === undefined) {
      this.timestamps.clear();
    } else {
      this.timestamps.delete(capabilityId);
    }
  }
}
