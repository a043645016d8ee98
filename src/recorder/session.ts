import type { ActionRecord } from '../types/action-record.js';
import type { ActionLogSink } from '../sinks/log-sink.js';
import { SerialQueue } from './serial-queue.js';

interface RecordEntry {
  record: ActionRecord;
  startedAtMonotonic: number;
}

/**
 * State of one recording session. Handles are created by
 * `ActionLogRecorder.beginSession` and passed back to every recorder call.
 */
export class SessionHandle {
  readonly queue = new SerialQueue();
  private entries = new Map<number, RecordEntry>();
  private nextIndex = 0;
  private failingSinks = new Set<string>();
  private closed = false;

  constructor(
    readonly id: string,
    readonly directory: string,
    readonly startedAt: string,
    readonly sinks: readonly ActionLogSink[],
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  markClosed(): void {
    this.closed = true;
  }

  allocateIndex(): number {
    return this.nextIndex++;
  }

  add(record: ActionRecord, startedAtMonotonic: number): void {
    this.entries.set(record.sequenceIndex, { record, startedAtMonotonic });
  }

  get(sequenceIndex: number): RecordEntry | undefined {
    return this.entries.get(sequenceIndex);
  }

  replace(record: ActionRecord): void {
    const entry = this.entries.get(record.sequenceIndex);
    if (entry) {
      this.entries.set(record.sequenceIndex, { ...entry, record });
    }
  }

  pending(): ActionRecord[] {
    return this.records().filter((r) => r.outcome === 'pending');
  }

  records(): ActionRecord[] {
    return [...this.entries.values()]
      .map((e) => e.record)
      .sort((a, b) => a.sequenceIndex - b.sequenceIndex);
  }

  /** Returns true the first time a sink fails since its last successful write. */
  noteSinkFailure(name: string): boolean {
    if (this.failingSinks.has(name)) return false;
    this.failingSinks.add(name);
    return true;
  }

  noteSinkSuccess(name: string): void {
    this.failingSinks.delete(name);
  }
}
