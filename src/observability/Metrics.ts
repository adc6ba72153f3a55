import type { ErrorKind } from "../core/Errors.js";
import type { InvocationStatus } from "../types/Outcome.js";
import type { TerminalJobStatus } from "../types/Job.js";

export interface CounterValue {
  name: string;
  labels: Record<string, string>;
  value: number;
}

export interface HistogramValue {
  name: string;
  labels: Record<string, string>;
  count: number;
  sum: number;
  buckets: Map<number, number>; // upper bound → count
}

const DEFAULT_BUCKETS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000];

/**
 * In-memory counters and histograms with label support.
 */
export class Metrics {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, { count: number; sum: number; values: number[] }>();

  increment(name: string, labels: Record<string, string> = {}, value = 1): void {
    const key = makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  observe(name: string, labels: Record<string, string>, value: number): void {
    const key = makeKey(name, labels);
    let hist = this.histograms.get(key);
    if (!hist) {
      hist = { count: 0, sum: 0, values: [] };
      this.histograms.set(key, hist);
    }
    hist.count++;
    hist.sum += value;
    hist.values.push(value);
  }

  getCounter(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(makeKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels: Record<string, string> = {}): HistogramValue | undefined {
    const hist = this.histograms.get(makeKey(name, labels));
    if (!hist) return undefined;
    return { name, labels, count: hist.count, sum: hist.sum, buckets: bucketize(hist.values) };
  }

  getAllCounters(): CounterValue[] {
    return [...this.counters].map(([key, value]) => ({ ...parseKey(key), value }));
  }

  recordJob(status: TerminalJobStatus, durationMs?: number): void {
    this.increment("jobs_total", { status });
    if (durationMs !== undefined) {
      this.observe("job_duration_ms", { status }, durationMs);
    }
  }

  recordInvocation(capabilityId: string, status: InvocationStatus, durationMs: number): void {
    this.increment("capability_invocations_total", { capabilityId, status });
    this.observe("capability_latency_ms", { capabilityId }, durationMs);
  }

  recordDenied(capabilityId: string, kind: ErrorKind): void {
    this.increment("capability_denied_total", { capabilityId, kind });
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

function bucketize(values: number[]): Map<number, number> {
  const buckets = new Map<number, number>();
  for (const bound of DEFAULT_BUCKETS) {
    buckets.set(bound, values.filter((v) => v <= bound).length);
  }
  return buckets;
}

function makeKey(name: string, labels: Record<string, string>): string {
  const sortedLabels = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join(",");
  return `${name}{${sortedLabels}}`;
}

function parseKey(key: string): { name: string; labels: Record<string, string> } {
  const match = /^(.+?)\{(.*)\}$/.exec(key);
  if (!match?.[1]) return { name: key, labels: {} };
  const labels: Record<string, string> = {};
  for (const part of (match[2] ?? "").split(",")) {
    const [k, v] = part.split("=");
    if (k && v !== undefined) labels[k] = v;
  }
  return { name: match[1], labels };
}
