import { randomUUID } from "crypto";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const LOG_BUFFER_CAPACITY = 500;

export interface LogEntry {
  id: string;
  timestamp: number;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  source?: string;
}

/** Every field narrows the result; an empty query matches everything. */
export interface LogQuery {
  levels?: readonly LogLevel[];
  source?: string;
  /** Case-insensitive match against message, source and context */
  search?: string;
  /** Inclusive lower bound, epoch ms */
  since?: number;
  /** Inclusive upper bound, epoch ms */
  until?: number;
}

/**
 * Fixed-size ring of the most recent log entries. Once full, each push
 * overwrites the oldest slot. Reads return entries oldest first.
 */
export class LogBuffer {
  private readonly slots: Array<LogEntry | undefined>;
  private next = 0;
  private count = 0;

  constructor(readonly capacity: number = LOG_BUFFER_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`LogBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<LogEntry | undefined>(capacity).fill(undefined);
  }

  push(entry: Omit<LogEntry, "id">): LogEntry {
    const stored: LogEntry = { id: randomUUID(), ...entry };
    this.slots[this.next] = stored;
    this.next = (this.next + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
    return stored;
  }

  get length(): number {
    return this.count;
  }

  getAll(): LogEntry[] {
    return this.query({});
  }

  query(query: LogQuery): LogEntry[] {
    const matches = compileQuery(query);
    const oldest = (this.next - this.count + this.capacity) % this.capacity;
    const result: LogEntry[] = [];

    for (let offset = 0; offset < this.count; offset++) {
      const entry = this.slots[(oldest + offset) % this.capacity];
      if (entry && matches(entry)) {
        result.push(entry);
      }
    }
    return result;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.next = 0;
    this.count = 0;
  }
}

function compileQuery(query: LogQuery): (entry: LogEntry) => boolean {
  const levels = query.levels && query.levels.length > 0 ? new Set(query.levels) : null;
  const needle = query.search ? query.search.toLowerCase() : "";
  const { source, since, until } = query;

  return (entry) => {
    if (levels && !levels.has(entry.level)) return false;
    if (source !== undefined && entry.source !== source) return false;
    if (since !== undefined && entry.timestamp < since) return false;
    if (until !== undefined && entry.timestamp > until) return false;
    return needle === "" || searchableText(entry).includes(needle);
  };
}

function searchableText(entry: LogEntry): string {
  let context = "";
  if (entry.context) {
    try {
      context = JSON.stringify(entry.context);
    } catch {
      // Unserializable context (cycles, bigint) is left out of the search
      context = "";
    }
  }
  return `${entry.message}\n${entry.source ?? ""}\n${context}`.toLowerCase();
}

export const logBuffer = new LogBuffer();
