/**
 * Tracing
 *
 * Records engine decisions (which strategy answered a query, how many cache
 * entries a lookup filled) for debugging and tests. Recording is off unless
 * `debug` or `<scope>.trace` is set; enabled records are also printed with an
 * `[arithmos:<scope>]` prefix.
 */

import { config } from "./config.js";

/**
 * A single trace event.
 */
export interface TraceRecord {
  /** The tracer that produced the record, e.g. "triangle" */
  scope: string;
  /** Short event name, e.g. "range-sum" */
  event: string;
  /** Human-readable detail */
  message: string;
  /** Timestamp for ordering */
  timestamp: number;
}

const DEFAULT_CAPACITY = 1000;

export class Tracer {
  private records: TraceRecord[] = [];
  private forced: boolean | undefined;

  constructor(
    readonly scope: string,
    private readonly capacity: number = DEFAULT_CAPACITY,
  ) {}

  /**
   * Check if tracing is enabled, either programmatically or through config.
   */
  isEnabled(): boolean {
    if (this.forced !== undefined) return this.forced;
    return config.flag("debug") || config.flag(`${this.scope}.trace`);
  }

  /**
   * Enable tracing regardless of config.
   */
  enable(): void {
    this.forced = true;
  }

  /**
   * Disable tracing regardless of config.
   */
  disable(): void {
    this.forced = false;
  }

  /**
   * Record an event. Only the most recent `capacity` records are kept.
   */
  record(event: string, message: string): void {
    if (!this.isEnabled()) return;

    const record: TraceRecord = { scope: this.scope, event, message, timestamp: Date.now() };
    this.records.push(record);
    if (this.records.length > this.capacity) this.records.shift();

    console.log(formatRecord(record));
  }

  getAllRecords(): TraceRecord[] {
    return [...this.records];
  }

  getRecordsFor(event: string): TraceRecord[] {
    return this.records.filter((r) => r.event === event);
  }

  clear(): void {
    this.records = [];
  }

  /**
   * Format every kept record, one per line.
   */
  formatForCLI(): string {
    if (this.records.length === 0) return `[arithmos:${this.scope}] no trace records`;
    return this.records.map(formatRecord).join("\n");
  }
}

function formatRecord(record: TraceRecord): string {
  return `[arithmos:${record.scope}] ${record.event}: ${record.message}`;
}

export function createTracer(scope: string, capacity?: number): Tracer {
  return new Tracer(scope, capacity);
}
