import { EventEmitter } from "eventemitter3";
import type { AnyRuntimeEvent, RuntimeEventType } from "../types/Events.js";

/**
 * Event log entry with sequence number.
 */
export interface LogEntry {
  seq: number;
  event: AnyRuntimeEvent;
}

export type EventListener = (entry: LogEntry) => void;

export interface EventQuery {
  type?: RuntimeEventType;
  jobId?: string;
  capabilityId?: string;
  /** Only entries after this sequence number */
  since?: number;
  /** Keep the most recent N */
  limit?: number;
}

/**
 * Append-only, bounded, in-memory log of job and capability events.
 */
export class EventLog {
  private readonly entries: LogEntry[] = [];
  private seq = 0;
  private readonly maxEntries: number;
  private readonly emitter = new EventEmitter();

  constructor(options: { maxEntries?: number } = {}) {
    this.maxEntries = options.maxEntries ?? 10_000;
  }

  append(event: AnyRuntimeEvent): LogEntry {
    const entry: LogEntry = { seq: ++this.seq, event };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    this.emitter.emit("event", entry);
    this.emitter.emit(event.type, entry);
    return entry;
  }

  /**
   * Subscribe to all events. Returns an unsubscribe function.
   */
  on(listener: EventListener): () => void {
    this.emitter.on("event", listener);
    return () => this.emitter.off("event", listener);
  }

  onType(type: RuntimeEventType, listener: EventListener): () => void {
    this.emitter.on(type, listener);
    return () => this.emitter.off(type, listener);
  }

  query(filter: EventQuery): LogEntry[] {
    const { since, type, jobId, capabilityId, limit } = filter;
    let results = this.entries.filter(
      (e) =>
        (since === undefined || e.seq > since) &&
        (type === undefined || e.event.type === type) &&
        (jobId === undefined || e.event.jobId === jobId) &&
        (capabilityId === undefined ||
          ("capabilityId" in e.event && e.event.capabilityId === capabilityId)),
    );
    if (limit) {
      results = results.slice(-limit);
    }
    return results;
  }

  getAll(): readonly LogEntry[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }

  /**
   * Drop all entries and listeners.
   */
  clear(): void {
    this.entries.length = 0;
    this.seq = 0;
    this.emitter.removeAllListeners();
  }
}
