import { join } from 'node:path';
import type { ActionRecord } from '../types/action-record.js';
import { appendLines, truncateFile, type ActionLogSink, type SinkContext } from './log-sink.js';

export const JSON_LOG_FILE = 'automation_log.json';

/**
 * Line-delimited JSON log. A record is written once, when it is finalized or
 * closed as incomplete; pending records only live in the session until then.
 */
export class JsonlLogSink implements ActionLogSink {
  readonly name = 'json';
  private path = '';

  async open(context: SinkContext): Promise<void> {
    this.path = join(context.directory, JSON_LOG_FILE);
    await truncateFile(this.path, '');
  }

  async recordStarted(): Promise<void> {}

  async recordFinalized(record: ActionRecord): Promise<void> {
    await appendLines(this.path, [JSON.stringify(record)]);
  }

  async recordIncomplete(record: ActionRecord): Promise<void> {
    await appendLines(this.path, [JSON.stringify({ ...record, incomplete: true })]);
  }

  async close(): Promise<void> {}
}
