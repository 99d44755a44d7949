/**
 * Ring buffer of engine log entries (FIFO).
 *
 * Entries logged with a `runId` or `artifactId` in their context can be pulled
 * back per run, which is how callers inspect what happened to one execution
 * without reading orchestrator.log.
 */

import crypto from "crypto";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  id: string;
  timestamp: number;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  source?: string;
}

export interface FilterOptions {
  levels?: LogLevel[];
  sources?: string[];
  search?: string;
  startTime?: number;
  endTime?: number;
  /** Only entries whose context.runId matches */
  runId?: string;
  /** Only entries whose context.artifactId matches */
  artifactId?: string;
}

export const DEFAULT_LOG_BUFFER_SIZE = 500;

let instance: LogBuffer | null = null;

function normalizeMaxSize(maxSize: number): number {
  if (!Number.isFinite(maxSize)) return DEFAULT_LOG_BUFFER_SIZE;
  return Math.max(1, Math.floor(maxSize));
}

export class LogBuffer {
  private buffer: LogEntry[] = [];
  private readonly maxSize: number;

  constructor(maxSize = DEFAULT_LOG_BUFFER_SIZE) {
    this.maxSize = normalizeMaxSize(maxSize);
  }

  static getInstance(): LogBuffer {
    if (!instance) {
      instance = new LogBuffer();
    }
    return instance;
  }

  push(entry: Omit<LogEntry, "id">): LogEntry {
    const fullEntry: LogEntry = {
      ...entry,
      id: crypto.randomUUID(),
    };

    this.buffer.push(fullEntry);
    if (this.buffer.length > this.maxSize) {
      this.buffer = this.buffer.slice(-this.maxSize);
    }

    return fullEntry;
  }

  getAll(): LogEntry[] {
    return [...this.buffer];
  }

  getFiltered(options: FilterOptions): LogEntry[] {
    const { levels, sources, search, startTime, endTime, runId, artifactId } = options;
    const searchLower = search?.toLowerCase();

    return this.buffer.filter((entry) => {
      if (levels && levels.length > 0 && !levels.includes(entry.level)) return false;
      if (sources && sources.length > 0) {
        if (entry.source === undefined || !sources.includes(entry.source)) return false;
      }
      if (runId !== undefined && entry.context?.runId !== runId) return false;
      if (artifactId !== undefined && entry.context?.artifactId !== artifactId) return false;
      if (startTime !== undefined && entry.timestamp < startTime) return false;
      if (endTime !== undefined && entry.timestamp > endTime) return false;
      if (searchLower) {
        return (
          entry.message.toLowerCase().includes(searchLower) ||
          (entry.source?.toLowerCase().includes(searchLower) ?? false) ||
          (entry.context !== undefined &&
            JSON.stringify(entry.context).toLowerCase().includes(searchLower))
        );
      }
      return true;
    });
  }

  /** Every entry logged for one run, oldest first. */
  getRunLog(runId: string): LogEntry[] {
    return this.getFiltered({ runId });
  }

  getSources(): string[] {
    const sources = new Set<string>();
    for (const entry of this.buffer) {
      if (entry.source) {
        sources.add(entry.source);
      }
    }
    return Array.from(sources).sort();
  }

  clear(): void {
    this.buffer = [];
  }

  get length(): number {
    return this.buffer.length;
  }
}

export const logBuffer = LogBuffer.getInstance();
